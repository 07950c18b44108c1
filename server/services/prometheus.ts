import type { StoredExperiment } from '../types.js';

export type PrometheusMode = 'pushgateway' | 'scrape' | 'both';

export interface PrometheusConfig {
  enabled: boolean;
  mode: PrometheusMode;
  pushgatewayUrl?: string;
  jobName: string;
}

function esc(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function line(name: string, labels: Record<string, string>, value: number): string {
  const labelText = Object.entries(labels)
    .map(([k, v]) => `${k}="${esc(v)}"`)
    .join(',');
  return `${name}{${labelText}} ${Number.isFinite(value) ? value : 0}`;
}

function metricMeta(name: string, type: 'gauge' | 'counter', help: string): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
}

export function toPrometheusText(experiment: StoredExperiment): string {
  const { experimentId, report } = experiment;
  const out: string[] = [];

  out.push(...metricMeta('occ_sim_avg_elapsed_time', 'gauge', 'Average simulated time until every client committed.'));
  out.push(...metricMeta('occ_sim_avg_write_calls', 'gauge', 'Average write calls served per run.'));
  out.push(...metricMeta('occ_sim_avg_write_failures', 'gauge', 'Average version-mismatch write rejections per run.'));
  out.push(...metricMeta('occ_sim_write_failure_ratio', 'gauge', 'Rejected writes over total writes, between 0 and 1.'));
  out.push(...metricMeta('occ_sim_repetitions', 'gauge', 'Runs averaged into each cell.'));

  for (const row of report.rows) {
    const labels = {
      experiment_id: experimentId,
      clients: String(row.populationSize),
      backoff: row.variant
    };
    out.push(line('occ_sim_avg_elapsed_time', labels, row.avgElapsedTime));
    out.push(line('occ_sim_avg_write_calls', labels, row.avgWriteCalls));
    out.push(line('occ_sim_avg_write_failures', labels, row.avgWriteFailures));
    out.push(line('occ_sim_write_failure_ratio', labels, row.avgWriteCalls === 0 ? 0 : row.avgWriteFailures / row.avgWriteCalls));
  }

  out.push(line('occ_sim_repetitions', { experiment_id: experimentId }, report.config.repetitions));
  return `${out.join('\n')}\n`;
}

export function shouldPushToGateway(config: PrometheusConfig): boolean {
  return config.enabled && (config.mode === 'pushgateway' || config.mode === 'both');
}

export function shouldExposeScrape(config: PrometheusConfig): boolean {
  return config.enabled && (config.mode === 'scrape' || config.mode === 'both');
}

export async function pushExperimentToPushgateway(
  experiment: StoredExperiment,
  pushgatewayUrl: string,
  jobName = 'occ_backoff_sim'
): Promise<void> {
  const res = await fetch(`${pushgatewayUrl}/metrics/job/${encodeURIComponent(jobName)}`, {
    method: 'POST',
    headers: { 'Content-Type': 'text/plain; version=0.0.4' },
    body: toPrometheusText(experiment)
  });
  if (!res.ok) throw new Error(`Pushgateway push failed (${res.status})`);
}

export async function checkPushgateway(pushgatewayUrl: string): Promise<'connected' | 'error'> {
  try {
    const res = await fetch(`${pushgatewayUrl}/-/healthy`);
    if (res.ok) return 'connected';

    // Some Pushgateway deployments don't expose /-/healthy.
    const fallback = await fetch(pushgatewayUrl);
    return fallback.ok ? 'connected' : 'error';
  } catch (err) {
    console.error('[health] pushgateway unreachable:', err);
    return 'error';
  }
}
