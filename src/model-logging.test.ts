import { afterEach, describe, expect, it, vi } from 'vitest';
import { generateText } from 'ai';
import { getPromptPreview, withProgressIndicator } from './model-logging';
import { createFakeModel } from './testing/fake-model';

function captureStdout() {
	const lines: string[] = [];
	vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
		lines.push(String(chunk));
		return true;
	});
	return lines;
}

describe('withProgressIndicator', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('returns the model untouched when progress is off', () => {
		const fake = createFakeModel([]);

		expect(withProgressIndicator(fake.model, 'fake/model', false)).toBe(fake.model);
	});

	it('logs the start and the completion of a call', async () => {
		const fake = createFakeModel(['hello there']);
		const model = withProgressIndicator(fake.model, 'fake/model');
		const lines = captureStdout();

		const { text } = await generateText({ model, system: 'You are terse.', prompt: 'Say hi' });

		expect(text).toBe('hello there');
		expect(lines).toHaveLength(2);
		expect(lines[0]).toBe('[fake/model #1] 🚩 Start generating | prompt: "You are terse. Say hi" | active: 1\n');
		expect(lines[1].startsWith('[fake/model #1] ✅ Complete generating: 10→20 tokens in ')).toBe(true);
		expect(lines[1].endsWith(' | active: 0 | reason: stop | result: "hello there"\n')).toBe(true);
	});

	it('numbers calls and logs failures', async () => {
		const fake = createFakeModel(['ok', new Error('boom')]);
		const model = withProgressIndicator(fake.model, 'fake/model');
		const lines = captureStdout();

		await generateText({ model, prompt: 'one' });
		await expect(generateText({ model, prompt: 'two', maxRetries: 0 })).rejects.toThrow('boom');

		expect(lines[2]).toBe('[fake/model #2] 🚩 Start generating | prompt: "two" | active: 1\n');
		expect(lines[3]).toBe('[fake/model #2] ❌ Failed generating: boom | active: 0\n');
	});
});

describe('getPromptPreview', () => {
	it('truncates long prompts to the preview limit', () => {
		const preview = getPromptPreview({
			prompt: [
				{ role: 'system', content: 'abc' },
				{ role: 'user', content: [{ type: 'text', text: 'x'.repeat(50) }] },
			],
		});

		expect(preview).toEqual({ text: `abc ${'x'.repeat(36)}`, truncated: true });
	});

	it('collapses whitespace', () => {
		const preview = getPromptPreview({
			prompt: [{ role: 'user', content: [{ type: 'text', text: '  a\n\n  b ' }] }],
		});

		expect(preview).toEqual({ text: 'a b', truncated: false });
	});

	it('has nothing to show for an empty prompt', () => {
		expect(getPromptPreview({ prompt: [] })).toBeUndefined();
	});
});
