describe('config', () => {
  const keys = ['PORT', 'DATA_DIR', 'LOCK_DIR', 'IMAGES_DIR', 'OPENAI_API_KEY_FILE', 'OPENAI_MODEL', 'AI_ENABLED', 'AI_FIELDS'];
  const saved: Record<string, string | undefined> = {};

  beforeAll(() => {
    for (const key of keys) saved[key] = process.env[key];
  });

  beforeEach(() => {
    jest.resetModules();
    for (const key of keys) delete process.env[key];
  });

  afterAll(() => {
    for (const key of keys) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('uses defaults when nothing is set', async () => {
    const { cfg } = await import('../src/config.js');

    expect(cfg.port).toBe(8000);
    expect(cfg.dataDir).toBe('.data');
    expect(cfg.lockDir).toBe('.data/locks');
    expect(cfg.imagesDir).toBe('static/images');
    expect(cfg.openai.model).toBe('');
    expect(cfg.ai.enabled).toBe('true');
    expect(cfg.ai.fields).toBe('title,description');
  });

  it('derives lock and key locations from DATA_DIR', async () => {
    process.env.DATA_DIR = '/srv/gallery';
    const { cfg } = await import('../src/config.js');

    expect(cfg.lockDir).toBe('/srv/gallery/locks');
    expect(cfg.openai.apiKeyFile).toBe('/srv/gallery/openai_api_key.txt');
  });

  it('reads overrides from the environment', async () => {
    process.env.PORT = '9100';
    process.env.LOCK_DIR = '/run/gallery';
    process.env.AI_ENABLED = 'no';
    const { cfg } = await import('../src/config.js');

    expect(cfg.port).toBe(9100);
    expect(cfg.lockDir).toBe('/run/gallery');
    expect(cfg.ai.enabled).toBe('no');
  });
});
