import type { IGitModule } from '../git';
import type { ChangelogStore } from '../changelog_store';
import type { SemanticVersion } from '../version_calculator';

/**
 * ChangelogGenerator Dependencies - Facade + Dependency Injection Pattern
 */
export type ChangelogGeneratorDependencies = {
  git: IGitModule;
  store: ChangelogStore;
  /** Web URL commit links point into, already normalized */
  remoteUrl: string;
  /** Clock used for the section date (default: current time) */
  now?: () => Date;
};

/**
 * Options for a single generation run
 */
export type GenerateOptions = {
  /** One section per path, holding only commits that touched it */
  follow?: string[];
  /** Name of the single section written when no paths are followed */
  sectionName?: string;
};

export type GeneratedSection = {
  name: string;
  version: SemanticVersion;
  entryCount: number;
};

export type GenerationResult = {
  /** Where the changelog was written */
  location: string;
  /** Sections added by this run, newest first */
  sections: GeneratedSection[];
  /** True when legacy sections without versions were rewritten */
  backfilled: boolean;
  /** Full changelog text as written */
  content: string;
};

export interface IChangelogGenerator {
  /**
   * Merges new commits into the changelog and rewrites it.
   *
   * @throws InvalidRefError when the repository has no history
   * @throws ChangelogWriteError when the changelog cannot be written
   */
  generate(options?: GenerateOptions): Promise<GenerationResult>;
}
