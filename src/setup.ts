import 'dotenv/config';

import { z } from 'zod';
import { ConfigurationError } from './errors';
import { resolveProviderConfig, type ProviderKind, type ResolvedProviderConfig } from './provider-config';

const DEFAULT_MODELS: Record<ProviderKind, string> = {
	generic: 'gemini-1.5-flash',
	openai: 'gpt-4o-mini',
	anthropic: 'claude-3-5-haiku-latest',
};

// A blank line in .env (`REFLECTION_TEMPERATURE=`) counts as unset
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
	z.preprocess(value => (value === '' ? undefined : value), schema);

const EnvSchema = z.object({
	REFLECTION_PROVIDER: blankAsUnset(z.enum(['generic', 'openai', 'anthropic']).default('generic')),
	REFLECTION_MODEL: blankAsUnset(z.string().optional()),
	REFLECTION_TEMPERATURE: blankAsUnset(z.coerce.number().optional()),
	OPENAI_API_KEY: z.string().optional(),
	OPENAI_ORGANIZATION: z.string().optional(),
	ANTHROPIC_API_KEY: z.string().optional(),
});

export type Env = Record<string, string | undefined>;

/**
 * Read the provider config from environment variables (and .env, via dotenv).
 * Unset credentials are passed through as empty strings so the config schema
 * reports them.
 */
export function loadProviderConfig(env: Env = process.env): ResolvedProviderConfig {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigurationError(
			'invalid environment',
			parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
		);
	}

	const vars = parsed.data;
	const provider = vars.REFLECTION_PROVIDER;
	const modelName = vars.REFLECTION_MODEL ?? DEFAULT_MODELS[provider];
	const temperature = vars.REFLECTION_TEMPERATURE;

	switch (provider) {
		case 'generic':
			return resolveProviderConfig({ provider, modelName, temperature });
		case 'openai':
			return resolveProviderConfig({
				provider,
				modelName,
				temperature,
				apiKey: vars.OPENAI_API_KEY ?? '',
				organization: vars.OPENAI_ORGANIZATION ?? '',
			});
		case 'anthropic':
			return resolveProviderConfig({
				provider,
				modelName,
				temperature,
				apiKey: vars.ANTHROPIC_API_KEY ?? '',
			});
	}
}

export function showProgressIndicators(env: Env = process.env): boolean {
	return env.REFLECTION_SHOW_PROGRESS !== 'false';
}
