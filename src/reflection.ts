/**
 * REFLECTION ENGINE
 *
 * Improves a model's answer by having it critique its own first draft.
 *
 * HOW IT WORKS:
 * 1. Draft: send the prompt template as-is
 * 2. Critique: ask the model, in the template's persona, for suggestions on the
 *    draft, either against the caller's criteria or against four points it
 *    picks itself
 * 3. Revise: ask for a new version that applies the suggestions
 *
 * Each stage waits for the previous one. One engine runs one reflection at a
 * time; overlapping calls are rejected rather than queued.
 */

import type { LanguageModelV2 } from '@ai-sdk/provider';

import {
	EngineBusyError,
	GenerationError,
	ProviderInitError,
	ReflectionError,
	type ReflectionStage
} from './errors';
import type { PromptTemplate } from './prompt-template';
import { buildCritiquePrompt, buildRevisionPrompt } from './prompts';
import { describeProvider, resolveProviderConfig, type ProviderConfig } from './provider-config';
import { createCompletionCapability, type CompletionCallOptions, type CompletionFn } from './providers';

export interface ReflectionEngineOptions {
	/** Run on this model instead of the one the config describes */
	model?: LanguageModelV2;
	/** Log every model call to stdout */
	showProgress?: boolean;
}

export type GenerateOptions = CompletionCallOptions;

/** [draft, critique, revision] of the last successful run, or empty */
export type RunHistory = readonly string[];

const EMPTY_HISTORY: RunHistory = Object.freeze([]);

export class ReflectionEngine {
	readonly systemMessage: string;
	readonly modelLabel: string;

	private readonly complete: CompletionFn;
	private lastRun: RunHistory = EMPTY_HISTORY;
	private running = false;

	constructor(config: ProviderConfig, systemMessage: string, options: ReflectionEngineOptions = {}) {
		const resolved = resolveProviderConfig(config);
		this.systemMessage = systemMessage;
		this.modelLabel = describeProvider(resolved);
		this.complete = createCompletionCapability(resolved, systemMessage, options);
	}

	get history(): RunHistory {
		return this.lastRun;
	}

	/**
	 * Run draft → critique → revision and return the revised text.
	 *
	 * History is only replaced once all three stages succeed; a failed run
	 * leaves the previous run's history in place.
	 */
	async generateText(
		prompt: PromptTemplate,
		criteria: readonly string[] = [],
		options: GenerateOptions = {}
	): Promise<string> {
		if (this.running) {
			throw new EngineBusyError(this.modelLabel);
		}

		this.running = true;
		// The caller may touch the array while we wait on the model
		const points = [...criteria];
		try {
			const draft = await this.runStage('draft', prompt.renderedPrompt, options);

			const critique = await this.runStage('critique', buildCritiquePrompt({
				persona: prompt.persona,
				task: prompt.task,
				draft,
				criteria: points,
			}), options);

			const revision = await this.runStage('revision', buildRevisionPrompt({
				task: prompt.task,
				draft,
				critique,
				criteria: points,
			}), options);

			this.lastRun = Object.freeze([draft, critique, revision]);
			return revision;
		} finally {
			this.running = false;
		}
	}

	private async runStage(stage: ReflectionStage, prompt: string, options: GenerateOptions): Promise<string> {
		let text: string;
		try {
			text = await this.complete(prompt, options);
		} catch (error) {
			if (error instanceof ProviderInitError) {
				throw error.atStage(stage);
			}
			// the rest of the family already says what went wrong
			if (error instanceof ReflectionError) {
				throw error;
			}
			const message = error instanceof Error ? error.message : String(error);
			throw new GenerationError(stage, message, error);
		}

		if (!text.trim()) {
			throw new GenerationError(stage, 'model returned an empty result');
		}

		return text;
	}
}
