import type { Application } from './Application';

/**
 * Long-lived part of an application with async setup and teardown.
 * The application is passed in on every lifecycle call; features do not keep a reference to it.
 */
export interface Feature {
  readonly name: string;
  startup(app: Application): Promise<void>;
  /** Called for every feature before the first `shutdown`, while all features are still up. */
  beforeShutdown?(app: Application): Promise<void>;
  shutdown(app: Application): Promise<void>;
}

export type FeatureClass<T extends Feature> = abstract new (...args: never[]) => T;
