/**
 * Text-generation providers using Vercel AI SDK.
 *
 * Every backend sits behind the same `TextGenerator` capability, so adding,
 * removing or reordering providers is a configuration change.
 */

import { generateText, type LanguageModel } from 'ai';
import type { Config } from '../config.js';
import { ProviderFailedError, ProviderUnavailableError } from '../types/errors.js';
import type { ProviderConfig, ProviderKind } from '../types/models.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/**
 * One text-generation backend.
 */
export interface TextGenerator {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly model: string;
  /** Credential present, or local service reachable */
  isAvailable(): Promise<boolean>;
  /** Single stateless request; no retries */
  generate(prompt: string): Promise<string>;
}

export interface GeneratorOptions {
  timeoutMs: number;
  maxOutputTokens: number;
  checkTimeoutMs: number;
  logger?: Logger;
  fetch?: typeof fetch;
}

export interface ProviderStatus {
  name: string;
  kind: ProviderKind;
  model: string;
  available: boolean;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Load the provider package for a kind and create the model.
 * Provider packages are imported lazily so unused ones cost nothing at startup.
 */
async function createModel(config: ProviderConfig): Promise<LanguageModel> {
  switch (config.kind) {
    case 'gemini': {
      const { createGoogleGenerativeAI } = await import('@ai-sdk/google');
      return createGoogleGenerativeAI({ apiKey: config.apiKey })(config.model);
    }

    case 'groq': {
      const { createGroq } = await import('@ai-sdk/groq');
      return createGroq({ apiKey: config.apiKey })(config.model);
    }

    case 'anthropic': {
      const { createAnthropic } = await import('@ai-sdk/anthropic');
      return createAnthropic({ apiKey: config.apiKey })(config.model);
    }

    case 'openai': {
      const { createOpenAI } = await import('@ai-sdk/openai');
      return createOpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl })(config.model);
    }

    case 'ollama': {
      // Ollama serves an OpenAI-compatible chat completions API under /v1
      const { createOpenAI } = await import('@ai-sdk/openai');
      const baseURL = `${(config.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, '')}/v1`;
      return createOpenAI({ apiKey: 'ollama', baseURL }).chat(config.model);
    }
  }
}

/**
 * TextGenerator backed by `generateText`.
 */
export class AiSdkTextGenerator implements TextGenerator {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly model: string;
  private readonly log: Logger;
  private readonly fetchImpl: typeof fetch;
  private modelPromise: Promise<LanguageModel> | null = null;

  constructor(
    private readonly config: ProviderConfig,
    private readonly options: GeneratorOptions
  ) {
    this.name = config.name;
    this.kind = config.kind;
    this.model = config.model;
    this.log = (options.logger ?? rootLogger).child({ provider: config.name });
    this.fetchImpl = options.fetch ?? fetch;
  }

  async isAvailable(): Promise<boolean> {
    if (this.kind !== 'ollama') {
      return Boolean(this.config.apiKey?.trim());
    }

    const baseUrl = (this.config.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, '');
    try {
      const response = await this.fetchImpl(`${baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(this.options.checkTimeoutMs),
      });
      return response.ok;
    } catch (error) {
      this.log.debug(`Ollama not reachable at ${baseUrl}: ${String(error)}`);
      return false;
    }
  }

  private getModel(): Promise<LanguageModel> {
    if (!this.modelPromise) {
      this.log.info(`Initializing LLM: ${this.kind}/${this.model}`);
      this.modelPromise = createModel(this.config);
    }
    return this.modelPromise;
  }

  async generate(prompt: string): Promise<string> {
    try {
      const model = await this.getModel();
      const result = await generateText({
        model,
        prompt,
        temperature: 0,
        maxOutputTokens: this.options.maxOutputTokens,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(this.options.timeoutMs),
      });

      this.log.info(
        `LLM API call successful - ` +
          `Input: ${result.usage.inputTokens ?? '?'}, ` +
          `Output: ${result.usage.outputTokens ?? '?'}`
      );
      return result.text;
    } catch (error) {
      this.log.warn(`LLM API call failed: ${String(error)}`);
      throw new ProviderFailedError(this.name, error, isTimeout(error));
    }
  }
}

/**
 * Providers in priority order, as configured.
 */
export function buildProviders(config: Config, logger?: Logger): TextGenerator[] {
  return config.providers.map(
    (provider) => new AiSdkTextGenerator(provider, { ...config.llm, logger })
  );
}

/**
 * Choose the provider for one request.
 *
 * A pinned provider (by name or kind) is used as-is or fails fast; otherwise
 * the first available provider in priority order wins. Only availability
 * checks run here: nothing is sent to a model.
 *
 * @throws ProviderUnavailableError
 */
export async function selectProvider(
  providers: readonly TextGenerator[],
  pinned?: string
): Promise<TextGenerator> {
  const wanted = pinned?.trim().toLowerCase();

  if (wanted) {
    const match = providers.find((p) => p.name.toLowerCase() === wanted || p.kind === wanted);
    if (!match) {
      throw new ProviderUnavailableError(`Unknown provider "${pinned}"`, pinned);
    }
    if (!(await match.isAvailable())) {
      throw new ProviderUnavailableError(`Provider "${match.name}" is not available`, match.name);
    }
    return match;
  }

  for (const provider of providers) {
    if (await provider.isAvailable()) {
      return provider;
    }
  }

  const names = providers.map((p) => p.name).join(', ');
  throw new ProviderUnavailableError(
    providers.length === 0
      ? 'No text-generation providers are configured'
      : `None of the configured providers is available (${names})`
  );
}

/**
 * Availability report for every configured provider.
 */
export async function describeProviders(
  providers: readonly TextGenerator[]
): Promise<ProviderStatus[]> {
  return Promise.all(
    providers.map(async (p) => ({
      name: p.name,
      kind: p.kind,
      model: p.model,
      available: await p.isAvailable(),
    }))
  );
}
