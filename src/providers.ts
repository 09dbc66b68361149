import { generateText } from 'ai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { LoadAPIKeyError, type LanguageModelV2 } from '@ai-sdk/provider';

import { ProviderInitError } from './errors';
import { withProgressIndicator } from './model-logging';
import {
	describeProvider,
	resolveProviderConfig,
	type ProviderConfig,
	type ResolvedProviderConfig
} from './provider-config';

export interface CompletionCallOptions {
	abortSignal?: AbortSignal;
}

/** Turns a prompt into model text. The system message is already bound. */
export type CompletionFn = (prompt: string, options?: CompletionCallOptions) => Promise<string>;

export interface CompletionOptions {
	/** Use this model instead of building one from the config */
	model?: LanguageModelV2;
	/** Log every model call to stdout */
	showProgress?: boolean;
}

/**
 * Build the AI SDK model for a validated config.
 * Add new providers here: one variant in provider-config.ts, one case below.
 */
export function createLanguageModel(config: ResolvedProviderConfig): LanguageModelV2 {
	try {
		switch (config.provider) {
			case 'generic':
				return createGoogleGenerativeAI()(config.modelName);

			case 'openai':
				return createOpenAI({
					apiKey: config.apiKey,
					organization: config.organization,
				})(config.modelName);

			case 'anthropic':
				return createAnthropic({ apiKey: config.apiKey })(config.modelName);

			default: {
				const unknown: never = config;
				throw new Error(`Unknown LLM provider: ${JSON.stringify(unknown)}`);
			}
		}
	} catch (error) {
		throw new ProviderInitError(
			`could not create ${describeProvider(config)} client`,
			config.provider,
			error
		);
	}
}

/**
 * Create the completion capability the reflection engine runs on.
 *
 * The config is validated first, so a ConfigurationError is raised before
 * any client exists. `systemMessage` is sent as the system prompt of every call.
 */
export function createCompletionCapability(
	config: ProviderConfig,
	systemMessage: string,
	options: CompletionOptions = {}
): CompletionFn {
	const resolved = resolveProviderConfig(config);
	const label = describeProvider(resolved);
	const model = withProgressIndicator(
		options.model ?? createLanguageModel(resolved),
		label,
		options.showProgress ?? false
	);

	return async (prompt, callOptions = {}) => {
		try {
			const { text } = await generateText({
				model,
				system: systemMessage,
				prompt,
				temperature: resolved.temperature,
				maxRetries: resolved.maxRetries,
				abortSignal: callOptions.abortSignal,
			});
			return text;
		} catch (error) {
			// Credentials are read lazily by the SDK, so a missing key only shows up here
			if (LoadAPIKeyError.isInstance(error)) {
				throw new ProviderInitError(error.message, resolved.provider, error);
			}
			throw error;
		}
	};
}
