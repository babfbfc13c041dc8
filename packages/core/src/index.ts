export * as Generator from "./changelog_generator";
export * as ChangelogParser from "./changelog_parser";
export * as ChangelogRenderer from "./changelog_renderer";
export * as Store from "./changelog_store";
export * as CommitClassifier from "./commit_classifier";
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Deduplicator from "./deduplicator";
export * as Errors from "./errors";
export * as Git from "./git";
export * as Logger from "./logger";
export * as RemoteResolver from "./remote_resolver";
export * as Section from "./section";
export * as VersionCalculator from "./version_calculator";
