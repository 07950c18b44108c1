import type { StoredExperiment } from '../types.js';
import { toPrometheusText } from './prometheus.js';

export class PrometheusReportStore {
  private latest: StoredExperiment | null = null;

  setLatest(experiment: StoredExperiment): void {
    this.latest = experiment;
  }

  getText(): string {
    if (!this.latest) {
      return '# No experiments run yet\n';
    }
    return toPrometheusText(this.latest);
  }
}
