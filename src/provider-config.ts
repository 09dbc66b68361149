import { z } from 'zod';
import { ConfigurationError } from './errors';

export const DEFAULT_TEMPERATURE = 0.7;

// Schemas - one per provider, joined on the `provider` tag

const requiredString = (field: string) => z.string({ required_error: `${field} is required` })
	.trim()
	.min(1, `${field} must not be empty`);

const baseFields = {
	modelName: requiredString('modelName'),
	maxRetries: z.number().int().min(0).optional(),
};

/** Google Gemini; the API key comes from GOOGLE_GENERATIVE_AI_API_KEY */
export const GenericConfigSchema = z.object({
	provider: z.literal('generic'),
	...baseFields,
	temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
});

export const OpenAIConfigSchema = z.object({
	provider: z.literal('openai'),
	...baseFields,
	temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
	apiKey: requiredString('apiKey'),
	organization: requiredString('organization'),
});

export const AnthropicConfigSchema = z.object({
	provider: z.literal('anthropic'),
	...baseFields,
	temperature: z.number().min(0).max(1).default(DEFAULT_TEMPERATURE),
	apiKey: requiredString('apiKey'),
});

export const ProviderConfigSchema = z.discriminatedUnion('provider', [
	GenericConfigSchema,
	OpenAIConfigSchema,
	AnthropicConfigSchema,
]);

/** What callers write; temperature may be left out */
export type ProviderConfig = z.input<typeof ProviderConfigSchema>;

/** A validated config with defaults applied */
export type ResolvedProviderConfig = Readonly<z.output<typeof ProviderConfigSchema>>;

export type ProviderKind = ResolvedProviderConfig['provider'];

/**
 * Validate a provider config and apply its defaults.
 * Throws ConfigurationError listing every problem found.
 */
export function resolveProviderConfig(config: ProviderConfig): ResolvedProviderConfig {
	const parsed = ProviderConfigSchema.safeParse(config);
	if (!parsed.success) {
		const issues = parsed.error.issues.map(issue => {
			const path = issue.path.join('.');
			return path ? `${path}: ${issue.message}` : issue.message;
		});
		throw new ConfigurationError('invalid provider configuration', issues);
	}

	return Object.freeze(parsed.data);
}

export function describeProvider(config: ResolvedProviderConfig): string {
	return `${config.provider}/${config.modelName}`;
}
