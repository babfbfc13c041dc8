/**
 * ConfigStore - Configuration persistence abstraction
 *
 * This module only exports the interface. For implementations, use:
 * - @changelog-gen/core/fs for FsConfigStore
 * - @changelog-gen/core/memory for MemoryConfigStore
 */

export type { ConfigStore } from './config_store';
