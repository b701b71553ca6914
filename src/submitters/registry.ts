import type { EnvSource, SubmitterEnvironment } from "../config/environment.js";
import { FarmConfig } from "../config/farmConfig.js";
import { UnknownSubmitterError } from "../core/errors.js";
import { SimpleFarmSubmitter } from "./simpleFarmSubmitter.js";
import { TractorSubmitter } from "./tractorSubmitter.js";
import type { FarmBackends, Submitter, SubmitterDeps } from "./types.js";

export type SubmitterFactory = (deps: SubmitterDeps) => Submitter;

export const BUILTIN_SUBMITTERS: ReadonlyMap<string, SubmitterFactory> = new Map<string, SubmitterFactory>([
  [TractorSubmitter.submitterName, (deps) => new TractorSubmitter(deps)],
  [SimpleFarmSubmitter.submitterName, (deps) => new SimpleFarmSubmitter(deps)]
]);

export class SubmitterRegistry {
  private readonly submitters = new Map<string, Submitter>();

  constructor(
    submitters: Submitter[],
    readonly defaultName: string
  ) {
    for (const s of submitters) this.submitters.set(s.name, s);
  }

  /** Builds every built-in submitter, each with the config file found for it. */
  static async load(env: EnvSource, settings: SubmitterEnvironment, backends: FarmBackends): Promise<SubmitterRegistry> {
    const submitters: Submitter[] = [];
    for (const [name, factory] of BUILTIN_SUBMITTERS) {
      const config = await FarmConfig.loadForSubmitter(name, env);
      submitters.push(factory({ env, settings, config, ...backends }));
    }
    return new SubmitterRegistry(submitters, settings.defaultSubmitter);
  }

  names(): string[] {
    return [...this.submitters.keys()].sort();
  }

  get(name?: string | null): Submitter {
    const wanted = name || this.defaultName;
    const submitter = this.submitters.get(wanted);
    if (!submitter) throw new UnknownSubmitterError(wanted);
    return submitter;
  }
}
