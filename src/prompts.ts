/**
 * Prompt builders for the critique and revision stages.
 *
 * Plain functions of their inputs, so the exact text sent to the model can be
 * checked without a model. Model output is embedded between XML-style tags as
 * is; a draft that itself contains `</FIRST_RESULT>` will confuse the reader of
 * the prompt. Nothing is escaped.
 */

export const FIRST_RESULT_TAG = 'FIRST_RESULT';
export const EXPERT_SUGGESTIONS_TAG = 'EXPERT_SUGGESTIONS';

export interface CritiquePromptInput {
	persona: string;
	task: string;
	draft: string;
	criteria: readonly string[];
}

export interface RevisionPromptInput {
	task: string;
	draft: string;
	critique: string;
	criteria: readonly string[];
}

export function wrapInTag(tag: string, text: string): string {
	return `<${tag}>\n${text}\n</${tag}>`;
}

/** "1. a\n2. b\n", in input order; empty items keep their number */
export function formatCriteria(criteria: readonly string[]): string {
	return criteria.map((item, index) => `${index + 1}. ${item}\n`).join('');
}

export function buildCritiquePrompt({ persona, task, draft, criteria }: CritiquePromptInput): string {
	const lines = [
		`Act as the following persona: ${persona}`,
		'Give constructive criticism and helpful suggestions to improve the result of the following task:',
		task,
		'',
		`The first result is delimited by XML tags <${FIRST_RESULT_TAG}></${FIRST_RESULT_TAG}>:`,
		wrapInTag(FIRST_RESULT_TAG, draft),
		'',
	];

	if (criteria.length > 0) {
		lines.push(
			'When writing suggestions, evaluate the first result against exactly these points and pay attention to whether there are ways to improve it:',
			formatCriteria(criteria)
		);
	} else {
		lines.push(
			'When writing suggestions, first define four reflection points for this task, then pay attention to whether there are ways to improve the first result on each of them.',
			''
		);
	}

	lines.push(
		'Write a list of specific, helpful and constructive suggestions for improving the result.',
		'Output only the suggestions and nothing else.'
	);

	return lines.join('\n');
}

export function buildRevisionPrompt({ task, draft, critique, criteria }: RevisionPromptInput): string {
	const lines = [
		'Your task is to carefully read, then edit, the result of the following task, taking into account a list of expert suggestions and constructive criticisms:',
		task,
		'',
		`The first result is delimited by XML tags <${FIRST_RESULT_TAG}></${FIRST_RESULT_TAG}>:`,
		wrapInTag(FIRST_RESULT_TAG, draft),
		'',
		`The expert suggestions are delimited by XML tags <${EXPERT_SUGGESTIONS_TAG}></${EXPERT_SUGGESTIONS_TAG}>:`,
		wrapInTag(EXPERT_SUGGESTIONS_TAG, critique),
		'',
		'Take the expert suggestions into account when you edit the first result.',
	];

	if (criteria.length > 0) {
		lines.push('Edit the first result by ensuring:', formatCriteria(criteria));
	}

	lines.push('Output only the new result and nothing else.');

	return lines.join('\n');
}
