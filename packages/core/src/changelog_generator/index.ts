export { ChangelogGenerator, formatDate } from './changelog_generator';

export type {
  IChangelogGenerator,
  ChangelogGeneratorDependencies,
  GenerateOptions,
  GeneratedSection,
  GenerationResult,
} from './changelog_generator.types';
