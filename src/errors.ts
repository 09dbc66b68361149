/**
 * Error types for the reflection workflow.
 *
 * Every error raised by this package extends ReflectionError, so callers can
 * catch the family with one `instanceof` check and still tell the cases apart
 * by class or by `name`.
 */

export type ReflectionStage = 'draft' | 'critique' | 'revision';

export class ReflectionError extends Error {
	/** Extra details for logs */
	readonly context: Record<string, unknown>;

	constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = 'ReflectionError';
		this.context = context;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			context: this.context,
			cause: this.cause instanceof Error ? this.cause.message : this.cause,
		};
	}
}

/** Invalid provider parameters or prompt fields. Raised before any network call. */
export class ConfigurationError extends ReflectionError {
	readonly issues: string[];

	constructor(message: string, issues: string[] = [], context: Record<string, unknown> = {}) {
		super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, context);
		this.name = 'ConfigurationError';
		this.issues = issues;
	}
}

/** The provider client could not be built, or could not authenticate. */
export class ProviderInitError extends ReflectionError {
	readonly provider: string;
	/** Set when the failure surfaced during a run */
	readonly stage?: ReflectionStage;

	constructor(message: string, provider: string, cause?: unknown, stage?: ReflectionStage) {
		super(message, stage === undefined ? { provider } : { provider, stage }, cause);
		this.name = 'ProviderInitError';
		this.provider = provider;
		this.stage = stage;
	}

	atStage(stage: ReflectionStage): ProviderInitError {
		return new ProviderInitError(this.message, this.provider, this.cause, stage);
	}
}

/** One of the three completion calls failed or came back empty. */
export class GenerationError extends ReflectionError {
	readonly stage: ReflectionStage;

	constructor(stage: ReflectionStage, message: string, cause?: unknown) {
		super(`${stage} stage failed: ${message}`, { stage }, cause);
		this.name = 'GenerationError';
		this.stage = stage;
	}
}

/** generateText was called while the same engine was still running. */
export class EngineBusyError extends ReflectionError {
	constructor(modelLabel: string) {
		super(`reflection engine for ${modelLabel} is already running`, { model: modelLabel });
		this.name = 'EngineBusyError';
	}
}
