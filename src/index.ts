export { ReflectionEngine } from './reflection';
export type { GenerateOptions, ReflectionEngineOptions, RunHistory } from './reflection';

export { PromptTemplate, PromptTemplateSchema } from './prompt-template';
export type { PromptTemplateFields } from './prompt-template';

export {
	buildCritiquePrompt,
	buildRevisionPrompt,
	formatCriteria,
	EXPERT_SUGGESTIONS_TAG,
	FIRST_RESULT_TAG,
} from './prompts';
export type { CritiquePromptInput, RevisionPromptInput } from './prompts';

export {
	ProviderConfigSchema,
	DEFAULT_TEMPERATURE,
	resolveProviderConfig,
} from './provider-config';
export type { ProviderConfig, ProviderKind, ResolvedProviderConfig } from './provider-config';

export { createCompletionCapability, createLanguageModel } from './providers';
export type { CompletionCallOptions, CompletionFn, CompletionOptions } from './providers';

export { withProgressIndicator } from './model-logging';

export {
	ConfigurationError,
	EngineBusyError,
	GenerationError,
	ProviderInitError,
	ReflectionError,
} from './errors';
export type { ReflectionStage } from './errors';
