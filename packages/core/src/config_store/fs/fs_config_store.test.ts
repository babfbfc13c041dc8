/**
 * FsConfigStore Unit Tests
 *
 * Tests FsConfigStore with mocked filesystem.
 */

import { FsConfigStore } from './fs_config_store';
import { ConfigValidationError } from '../../config_manager/errors';

jest.mock('fs', () => ({
  promises: {
    readFile: jest.fn(),
  },
}));

import { promises as fs } from 'fs';

const mockedFs = jest.mocked(fs);

describe('FsConfigStore', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should locate the config file in the repository root', () => {
    expect(FsConfigStore.forRepository('/test/repo').location).toBe('/test/repo/changelog.config.json');
  });

  it('should return the parsed document', async () => {
    mockedFs.readFile.mockResolvedValue('{"follow":["src"]}');
    const store = FsConfigStore.forRepository('/test/repo');

    expect(await store.loadConfig()).toEqual({ follow: ['src'] });
    expect(mockedFs.readFile).toHaveBeenCalledWith('/test/repo/changelog.config.json', 'utf-8');
  });

  it('should return null for a missing file', async () => {
    mockedFs.readFile.mockRejectedValue(Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' }));
    const store = new FsConfigStore('/test/repo/custom.json');

    expect(await store.loadConfig()).toBeNull();
  });

  it('should throw ConfigValidationError for invalid JSON', async () => {
    mockedFs.readFile.mockResolvedValue('{ invalid json }');
    const store = new FsConfigStore('/test/repo/custom.json');

    await expect(store.loadConfig()).rejects.toBeInstanceOf(ConfigValidationError);
  });

  it('should propagate other read failures', async () => {
    mockedFs.readFile.mockRejectedValue(Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));
    const store = new FsConfigStore('/test/repo/custom.json');

    await expect(store.loadConfig()).rejects.toThrow('EACCES: permission denied');
  });
});
