import appConfig from './app.config';

describe('appConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.APP_PORT;
    delete process.env.PORT;
    delete process.env.APP_NAME;
    delete process.env.APP_VERSION;
    delete process.env.API_PREFIX;
    delete process.env.SWAGGER_ENABLED;
    process.env.NODE_ENV = 'test';
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should apply defaults', async () => {
    expect(await appConfig()).toEqual({
      nodeEnv: 'test',
      name: 'Hospital Registry API',
      version: '1.0.0',
      port: 3000,
      apiPrefix: 'api',
      swaggerEnabled: true,
    });
  });

  it('should prefer APP_PORT over PORT', async () => {
    process.env.APP_PORT = '8080';
    process.env.PORT = '9090';

    expect((await appConfig()).port).toBe(8080);
  });

  it('should fall back to PORT', async () => {
    process.env.PORT = '9090';

    expect((await appConfig()).port).toBe(9090);
  });

  it('should disable swagger when SWAGGER_ENABLED is false', async () => {
    process.env.SWAGGER_ENABLED = 'false';

    expect((await appConfig()).swaggerEnabled).toBe(false);
  });

  it('should reject an unknown NODE_ENV', () => {
    process.env.NODE_ENV = 'staging';

    expect(() => appConfig()).toThrow('NODE_ENV');
  });

  it('should reject a non-numeric APP_PORT', () => {
    process.env.APP_PORT = 'eighty';

    expect(() => appConfig()).toThrow('APP_PORT');
  });
});
