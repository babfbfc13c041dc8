import { MemoryConfigStore } from './memory_config_store';

describe('MemoryConfigStore', () => {
  it('should return null when no config is set', async () => {
    expect(await new MemoryConfigStore().loadConfig()).toBeNull();
  });

  it('should return the config set via setConfig', async () => {
    const store = new MemoryConfigStore();
    store.setConfig({ sectionName: 'Main' });

    expect(await store.loadConfig()).toEqual({ sectionName: 'Main' });
  });
});
