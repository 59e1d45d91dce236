import { errorMessage } from '@utils/errors';
import { logDebug, logError, logInfo } from '@utils/logger';
import type { ServiceOptions } from '@utils/options';
import type { Feature, FeatureClass } from './Feature';

type AppState = 'created' | 'running' | 'stopped';

export class FeatureRegistry {
  private features = new Map<FeatureClass<Feature>, Feature>();

  constructor(private readonly isFrozen: () => boolean) {}

  /**
   * Registers `feature` as the instance of `key`.
   * Throws if the application already started, or if `key` is taken and `existOk` is not set.
   */
  add<T extends Feature>(key: FeatureClass<T>, feature: T, existOk = false) {
    if (this.isFrozen()) {
      throw new Error(`Feature "${feature.name}" must be added before the application starts`);
    }
    if (this.features.has(key)) {
      if (existOk) return;
      throw new Error(`Feature "${key.name}" already registered`);
    }
    this.features.set(key, feature);
  }

  get<T extends Feature>(key: FeatureClass<T>): T {
    const found = this.features.get(key);
    if (found === undefined) {
      throw new Error(`No feature found for "${key.name}"`);
    }
    if (!(found instanceof key)) {
      throw new Error(`Feature ${found.name} is not a "${key.name}"`);
    }
    return found;
  }

  has<T extends Feature>(key: FeatureClass<T>): boolean {
    return this.features.has(key);
  }

  /** Features in registration order. */
  values(): Feature[] {
    return [...this.features.values()];
  }
}

export class Application {
  readonly features: FeatureRegistry;
  private state: AppState = 'created';

  constructor(readonly options: ServiceOptions) {
    this.features = new FeatureRegistry(() => this.state !== 'created');
  }

  get name() {
    return this.options.name;
  }

  get running() {
    return this.state === 'running';
  }

  async start() {
    if (this.state !== 'created') throw new Error(`Application ${this.name} cannot start twice`);
    this.state = 'running';
    for (const feature of this.features.values()) {
      logDebug(`--> startup ${feature.name}`);
      await feature.startup(this);
      logDebug(`<-- startup ${feature.name}`);
    }
    logInfo(`[Main] ${this.name} started`);
  }

  async stop() {
    if (this.state !== 'running') return;
    this.state = 'stopped';
    for (const feature of this.features.values()) {
      if (!feature.beforeShutdown) continue;
      try {
        await feature.beforeShutdown(this);
      } catch (error) {
        logError(`[Main] Error before shutting down ${feature.name}: ${errorMessage(error)}`);
      }
    }
    for (const feature of this.features.values().reverse()) {
      try {
        logDebug(`--> shutdown ${feature.name}`);
        await feature.shutdown(this);
        logDebug(`<-- shutdown ${feature.name}`);
      } catch (error) {
        logError(`[Main] Error shutting down ${feature.name}: ${errorMessage(error)}`);
      }
    }
    logInfo(`[Main] ${this.name} stopped`);
  }
}
