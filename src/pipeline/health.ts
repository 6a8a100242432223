import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type HealthStatus = 'healthy' | 'unhealthy' | 'disabled';

export interface ComponentHealth {
  name: string;
  status: HealthStatus;
  detail?: string;
  checkedAt: string;
}

type Probe = () => Promise<boolean>;

/**
 * Health of the pipeline's collaborators. Components whose configuration is missing
 * are marked once at startup; live components register a probe that `check` runs.
 */
export class HealthRegistry {
  private readonly components = new Map<string, ComponentHealth>();
  private readonly probes = new Map<string, Probe>();

  mark(name: string, status: HealthStatus, detail?: string): void {
    this.components.set(name, { name, status, detail, checkedAt: new Date().toISOString() });
    if (status === 'unhealthy') logger.warn({ component: name, detail }, 'Component unhealthy');
  }

  register(name: string, probe: Probe): void {
    this.probes.set(name, probe);
    this.mark(name, 'healthy');
  }

  get(name: string): ComponentHealth | undefined {
    return this.components.get(name);
  }

  isHealthy(name: string): boolean {
    return this.components.get(name)?.status === 'healthy';
  }

  all(): ComponentHealth[] {
    return [...this.components.values()];
  }

  /** Run every probe and return the refreshed view. */
  async check(): Promise<ComponentHealth[]> {
    await Promise.all(
      [...this.probes.entries()].map(async ([name, probe]) => {
        try {
          const ok = await probe();
          this.mark(name, ok ? 'healthy' : 'unhealthy', ok ? undefined : 'probe failed');
        } catch (err) {
          this.mark(name, 'unhealthy', errorMessage(err));
        }
      }),
    );
    return this.all();
  }
}
