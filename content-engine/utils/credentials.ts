/**
 * Acting user and the LLM credentials resolved for them
 */

import { ConfigurationError } from './errors.js';
import { LLMCredentials } from './llm-client.js';

export const MISSING_CREDENTIALS_MESSAGE = 'Please configure AI first';

/**
 * Who a generation run acts on behalf of. Passed explicitly to every pipeline.
 */
export interface ActorContext {
  userId: string;
}

export interface CredentialsProvider {
  /** null when the user has no usable key or base URL */
  resolve(actor: ActorContext): Promise<LLMCredentials | null>;
}

/**
 * Per-user overrides on top of the process-wide defaults
 */
export class EnvCredentialsProvider implements CredentialsProvider {
  constructor(
    private defaults: LLMCredentials,
    private perUser: Readonly<Record<string, Partial<LLMCredentials>>> = {}
  ) {}

  async resolve(actor: ActorContext): Promise<LLMCredentials | null> {
    const override = this.perUser[actor.userId] ?? {};
    const credentials: LLMCredentials = {
      apiKey: (override.apiKey ?? this.defaults.apiKey).trim(),
      baseUrl: (override.baseUrl ?? this.defaults.baseUrl).trim(),
      model: (override.model ?? this.defaults.model).trim() || this.defaults.model
    };

    if (!credentials.apiKey || !credentials.baseUrl) return null;
    return credentials;
  }
}

/**
 * Credentials for `actor`, or the configuration error every pipeline reports
 * before its first LLM call
 */
export async function requireCredentials(provider: CredentialsProvider, actor: ActorContext): Promise<LLMCredentials> {
  const credentials = await provider.resolve(actor);
  if (!credentials) {
    throw new ConfigurationError(MISSING_CREDENTIALS_MESSAGE, { userId: actor.userId });
  }
  return credentials;
}
