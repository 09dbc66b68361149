import { wrapLanguageModel } from 'ai';
import type {
	LanguageModelV2,
	LanguageModelV2CallOptions,
	LanguageModelV2Usage
} from '@ai-sdk/provider';

/**
 * Model Logging
 *
 * Wraps any LanguageModelV2 with the AI SDK's `wrapLanguageModel` middleware so
 * each reflection stage shows up on stdout as it runs: a start line with a short
 * prompt preview, then a completion line with token usage, timing, finish reason
 * and a result preview. The wrapped model behaves exactly like the original.
 *
 * Only non-streaming generation is wrapped; the reflection engine never streams.
 */

const PREVIEW_LIMIT = 40;

function preview(text: string): string {
	const flat = text.trim().replace(/\s+/g, ' ');
	const truncated = flat.length > PREVIEW_LIMIT ? `${flat.slice(0, PREVIEW_LIMIT)}...` : flat;
	return truncated.replace(/"/g, '\\"');
}

function logCompletion(
	modelName: string,
	callId: number,
	startTime: number,
	usage: LanguageModelV2Usage | undefined,
	activeCalls: number,
	text: string,
	finishReason: string
) {
	const duration = ((Date.now() - startTime) / 1000).toFixed(2);

	const inputTokens = usage?.inputTokens ?? 0;
	const outputTokens = usage?.outputTokens ?? 0;

	const tokenInfo = inputTokens > 0
		? `${inputTokens}→${outputTokens} tokens`
		: `${outputTokens} tokens`;

	const resultSuffix = text ? ` | result: "${preview(text)}"` : '';

	process.stdout.write(
		`[${modelName} #${callId}] ✅ Complete generating: ${tokenInfo} in ${duration}s | active: ${activeCalls} | reason: ${finishReason}${resultSuffix}\n`
	);
}

interface PromptPreview {
	text: string;
	truncated: boolean;
}

export function getPromptPreview(params: LanguageModelV2CallOptions | undefined): PromptPreview | undefined {
	if (!params) {
		return undefined;
	}

	let text = '';
	let truncated = false;

	const appendText = (raw: string) => {
		if (text.length >= PREVIEW_LIMIT) {
			truncated = true;
			return;
		}

		const sanitized = raw.replace(/\s+/g, ' ').trim();
		if (!sanitized) {
			return;
		}

		const segment = text.length > 0 ? ` ${sanitized}` : sanitized;
		const remaining = PREVIEW_LIMIT - text.length;
		if (segment.length > remaining) {
			truncated = true;
		}

		text += segment.slice(0, remaining);
	};

	for (const message of params.prompt) {
		if (message.role === 'system') {
			appendText(message.content);
			continue;
		}

		for (const part of message.content) {
			if (part.type === 'text') {
				appendText(part.text);
			}
		}
	}

	if (!text) {
		return undefined;
	}

	return { text, truncated };
}

function formatPromptSuffix(promptPreview: PromptPreview | undefined) {
	if (!promptPreview) {
		return '';
	}

	const escaped = promptPreview.text.replace(/"/g, '\\"');
	const display = promptPreview.truncated ? `${escaped}...` : escaped;

	return ` | prompt: "${display}"`;
}

// Progress indicator wrapper
export function withProgressIndicator(
	model: LanguageModelV2,
	modelName: string,
	showProgress = true
): LanguageModelV2 {
	if (!showProgress) {
		return model;
	}

	let callCounter = 0;
	let activeCalls = 0;

	return wrapLanguageModel({
		model,
		middleware: {
			wrapGenerate: async ({ doGenerate, params }) => {
				const callId = ++callCounter;
				const startTime = Date.now();
				const promptSuffix = formatPromptSuffix(getPromptPreview(params));

				activeCalls++;
				process.stdout.write(
					`[${modelName} #${callId}] 🚩 Start generating${promptSuffix} | active: ${activeCalls}\n`
				);

				try {
					const result = await doGenerate();
					activeCalls--;

					const text = result.content
						.flatMap(part => (part.type === 'text' ? [part.text] : []))
						.join('');

					logCompletion(
						modelName,
						callId,
						startTime,
						result.usage,
						activeCalls,
						text,
						result.finishReason
					);

					return result;
				} catch (error) {
					activeCalls--;
					const message = error instanceof Error ? error.message : String(error);
					process.stdout.write(
						`[${modelName} #${callId}] ❌ Failed generating: ${message} | active: ${activeCalls}\n`
					);
					throw error;
				}
			},
		}
	});
}
