import { writeFile } from 'node:fs/promises';
import dotenv from 'dotenv';
import { toCsv } from '../../simulation/experiment/report.js';
import { runSweep, totalRuns } from '../../simulation/experiment/sweep.js';
import { DEFAULT_EXPERIMENT, type ExperimentConfig } from '../../simulation/types/simulation.js';
import { loadSweepScriptConfig } from '../config.js';
import { openTraceFiles } from '../services/traceFiles.js';

dotenv.config();

async function main(): Promise<void> {
  const scriptConfig = loadSweepScriptConfig();
  const config: ExperimentConfig = {
    ...DEFAULT_EXPERIMENT,
    populations: scriptConfig.populations,
    repetitions: scriptConfig.repetitions,
    seed: scriptConfig.seed
  };

  const traces = scriptConfig.traceDir ? await openTraceFiles(scriptConfig.traceDir, config.variants) : undefined;
  console.log(`[sweep] ${totalRuns(config)} runs across ${config.populations.length * config.variants.length} cells`);

  const report = await runSweep(config, {
    traceSinkFor: (variant) => traces?.get(variant),
    onCell: (row) => {
      console.log(
        `[sweep] clients=${row.populationSize} backoff=${row.variant} time=${row.avgElapsedTime.toFixed(1)} calls=${row.avgWriteCalls.toFixed(1)}`
      );
    }
  });

  await writeFile(scriptConfig.outputPath, toCsv(report.rows), 'utf8');
  console.log(`[sweep] wrote ${scriptConfig.outputPath}`);
}

main().catch((err) => {
  console.error('Sweep failed', err);
  process.exit(1);
});
