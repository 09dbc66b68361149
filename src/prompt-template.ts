import { z } from 'zod';
import { ConfigurationError } from './errors';

export const PromptTemplateSchema = z.object({
	persona: z.string().min(1, 'persona must not be empty'),
	task: z.string().min(1, 'task must not be empty'),
	context: z.string().default(''),
	outputFormat: z.string().default(''),
});

export type PromptTemplateFields = z.input<typeof PromptTemplateSchema>;

/**
 * The first-draft prompt: who the model is, what to do, and optionally extra
 * context and an output format instruction.
 *
 * The parts are joined with no separator at all, so callers add their own
 * spacing or newlines inside the fields.
 */
export class PromptTemplate {
	readonly persona: string;
	readonly task: string;
	readonly context: string;
	readonly outputFormat: string;

	constructor(fields: PromptTemplateFields) {
		const parsed = PromptTemplateSchema.safeParse(fields);
		if (!parsed.success) {
			throw new ConfigurationError(
				'invalid prompt template',
				parsed.error.issues.map(issue => issue.message)
			);
		}

		this.persona = parsed.data.persona;
		this.task = parsed.data.task;
		this.context = parsed.data.context;
		this.outputFormat = parsed.data.outputFormat;
		Object.freeze(this);
	}

	get renderedPrompt(): string {
		return this.persona + this.task + this.context + this.outputFormat;
	}
}
