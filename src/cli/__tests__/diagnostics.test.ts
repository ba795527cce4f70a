import { describe, it, expect } from 'vitest';
import { checkConfig, checkNodeVersion, checkProviders } from '../diagnostics.js';
import { fakeProvider } from '../../services/__tests__/fakes.js';

describe('checkNodeVersion', () => {
  it('accepts Node.js 20 and later', () => {
    expect(checkNodeVersion('v20.11.1')).toEqual({
      name: 'Node.js Version',
      passed: true,
      message: 'Node v20.11.1',
      fix: undefined,
    });
  });

  it('asks for an upgrade on older releases', () => {
    const check = checkNodeVersion('v18.19.0');
    expect(check.passed).toBe(false);
    expect(check.fix).toBe('Upgrade to Node.js 20 or higher');
  });
});

describe('checkConfig', () => {
  it('summarizes a valid configuration', () => {
    const { check, config } = checkConfig({
      DATABASE_PATH: ':memory:',
      LLM_PRIORITY: 'groq,openai',
    });
    expect(config).toBeDefined();
    expect(check).toEqual({
      name: 'Configuration',
      passed: true,
      message: 'Database sqlite3, providers groq, openai',
    });
  });

  it('reports every configuration issue', () => {
    const { check, config } = checkConfig({});
    expect(config).toBeUndefined();
    expect(check.passed).toBe(false);
    expect(check.message).toBe('DATABASE_PATH is required when DATABASE_TYPE is sqlite3');
  });
});

describe('checkProviders', () => {
  it('suggests a fix per provider kind', async () => {
    const checks = await checkProviders([
      fakeProvider('ollama', { kind: 'ollama', available: false }),
      fakeProvider('groq', { kind: 'groq', available: false }),
      fakeProvider('gemini'),
    ]);

    expect(checks).toEqual([
      {
        name: 'Provider ollama',
        passed: false,
        message: 'test-model not available',
        fix: 'Start Ollama or remove it from LLM_PRIORITY',
      },
      {
        name: 'Provider groq',
        passed: false,
        message: 'test-model not available',
        fix: 'Set the API key for groq',
      },
      { name: 'Provider gemini', passed: true, message: 'test-model available', fix: undefined },
    ]);
  });
});
