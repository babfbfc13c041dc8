export { MemoryGitModule } from './memory_git_module';
export type { MemoryCommitInput } from './memory_git_module';
