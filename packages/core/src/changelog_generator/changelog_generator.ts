import { categorize, isBreaking } from '../commit_classifier';
import type { CommitInfo, IGitModule } from '../git';
import type { ChangelogStore } from '../changelog_store';
import { parseChangelog, stripChangelogHeader, needsBackfill } from '../changelog_parser';
import { flattenEntries, filterNewEntries } from '../deduplicator';
import { formatEntry, renderChangelog, renderSections } from '../changelog_renderer';
import {
  computeNext,
  detectSeed,
  formatVersion,
  maxVersion,
  versionsEqual,
} from '../version_calculator';
import type { SemanticVersion } from '../version_calculator';
import {
  addSectionEntry,
  createSectionData,
  isSectionEmpty,
  sectionCategories,
  sectionEntryCount,
} from '../section';
import type { ParsedSection, RenderableSection, SectionData } from '../section';
import { DEFAULT_SECTION_NAME } from '../config_manager';
import { createLogger } from '../logger/logger';
import type {
  IChangelogGenerator,
  ChangelogGeneratorDependencies,
  GenerateOptions,
  GenerationResult,
} from './changelog_generator.types';

const logger = createLogger('[ChangelogGenerator] ');

type NamedSection = {
  name: string;
  data: SectionData;
};

type ExistingChangelog = {
  sections: ParsedSection[];
  /** Text carried below the new sections */
  preserved: string;
};

/**
 * YYYY-MM-DD in UTC
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * ChangelogGenerator - merges commit history into an existing changelog
 *
 * One run is a straight pipeline, every step awaited in turn:
 *
 * 1. collect the current sections from history
 * 2. load and parse the existing changelog
 * 3. detect the seed version from tags
 * 4. backfill versions into legacy sections
 * 5. drop entries already recorded
 * 6. assign versions to the sections left
 * 7. render and write
 *
 * Nothing is written when an earlier step fails.
 */
export class ChangelogGenerator implements IChangelogGenerator {
  private git: IGitModule;
  private store: ChangelogStore;
  private remoteUrl: string;
  private now: () => Date;

  constructor(dependencies: ChangelogGeneratorDependencies) {
    this.git = dependencies.git;
    this.store = dependencies.store;
    this.remoteUrl = dependencies.remoteUrl;
    this.now = dependencies.now ?? (() => new Date());
  }

  async generate(options: GenerateOptions = {}): Promise<GenerationResult> {
    const today = formatDate(this.now());

    const current = await this.collectCurrent(options);
    const existing = await this.loadExisting();
    const seed = detectSeed(await this.git.listTags());
    logger.debug(`Seed version ${formatVersion(seed)}`);

    let backfilled = false;
    if (needsBackfill(existing.sections)) {
      existing.preserved = this.backfill(existing.sections, seed, today);
      backfilled = true;
    }

    const recorded = flattenEntries(existing.sections);
    const fresh = current
      .map((section) => ({ name: section.name, data: filterNewEntries(section.data, recorded) }))
      .filter((section) => {
        if (isSectionEmpty(section.data)) {
          logger.debug(`Section "${section.name}" has no new entries`);
          return false;
        }
        return true;
      });

    const versioned = this.assignVersions(fresh, existing.sections, seed);
    // newest first: the last version assigned goes to the top
    const ordered = [...versioned].reverse();

    const content = renderChangelog(renderSections(ordered, today), existing.preserved);
    await this.store.write(content);

    logger.info(`Wrote ${ordered.length} new section(s) to ${this.store.location}`);

    return {
      location: this.store.location,
      sections: ordered.map((section) => ({
        name: section.name,
        version: section.version,
        entryCount: sectionEntryCount(section),
      })),
      backfilled,
      content,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PIPELINE STEPS
  // ═══════════════════════════════════════════════════════════════════════

  private async collectCurrent(options: GenerateOptions): Promise<NamedSection[]> {
    const history = await this.git.getCommitHistory();
    const follow = options.follow ?? [];

    if (follow.length === 0) {
      const name = options.sectionName ?? DEFAULT_SECTION_NAME;
      return [{ name, data: this.classify(history) }];
    }

    const sections: NamedSection[] = [];
    for (const path of follow) {
      const touching: CommitInfo[] = [];
      for (const commit of history) {
        if (await this.git.commitTouchesPath(commit, path)) {
          touching.push(commit);
        }
      }
      logger.debug(`${touching.length} of ${history.length} commits touch ${path}`);
      sections.push({ name: path, data: this.classify(touching) });
    }
    return sections;
  }

  private classify(commits: readonly CommitInfo[]): SectionData {
    const data = createSectionData();

    for (const commit of commits) {
      const type = categorize(commit.summary);
      if (type === null) {
        logger.debug(`Skipping ${commit.shortHash}: no known type in "${commit.summary}"`);
        continue;
      }

      addSectionEntry(data, type, formatEntry(commit, this.remoteUrl));
      if (isBreaking(commit.summary)) {
        data.hasBreakingChange = true;
      }
      logger.debug(`${commit.shortHash} -> ${type}`);
    }

    return data;
  }

  private async loadExisting(): Promise<ExistingChangelog> {
    const content = await this.store.read();
    if (content === null) {
      logger.debug(`No changelog at ${this.store.location}`);
      return { sections: [], preserved: '' };
    }
    return {
      sections: parseChangelog(content),
      preserved: stripChangelogHeader(content),
    };
  }

  /**
   * Gives every historical section the seed version and re-renders them with
   * their own dates. The result replaces the preserved text.
   */
  private backfill(sections: ParsedSection[], seed: SemanticVersion, today: string): string {
    logger.info(`Backfilling ${sections.length} section(s) with ${formatVersion(seed)}`);
    for (const section of sections) {
      section.version = { ...seed };
    }
    return renderSections(sections, today);
  }

  private assignVersions(
    sections: readonly NamedSection[],
    history: readonly ParsedSection[],
    seed: SemanticVersion
  ): (RenderableSection & { version: SemanticVersion })[] {
    let previous = maxVersion(
      history.flatMap((section) => (section.version ? [section.version] : []))
    );

    return sections.map((section) => {
      let version: SemanticVersion;
      if (previous === null) {
        version = { ...seed };
      } else {
        version = computeNext(previous, sectionCategories(section.data), section.data.hasBreakingChange);
        if (versionsEqual(version, previous)) {
          version = { ...previous, patch: previous.patch + 1 };
        }
      }
      previous = version;
      logger.debug(`Section "${section.name}" -> ${formatVersion(version)}`);
      return { name: section.name, version, ...section.data };
    });
  }
}
