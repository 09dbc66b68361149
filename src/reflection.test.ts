import { describe, it, expect } from 'vitest';
import { LoadAPIKeyError } from '@ai-sdk/provider';
import { ReflectionEngine } from './reflection';
import { PromptTemplate } from './prompt-template';
import { ConfigurationError, EngineBusyError, GenerationError, ProviderInitError } from './errors';
import { createFakeModel, type FakeReply } from './testing/fake-model';
import type { ProviderConfig } from './provider-config';

const config: ProviderConfig = { provider: 'generic', modelName: 'gemini-1.5-flash', maxRetries: 0 };

const translation = new PromptTemplate({
	persona: 'You are a translator',
	task: 'translate X',
});

function engineWith(replies: FakeReply[], systemMessage = 'You are a translator') {
	const fake = createFakeModel(replies);
	const engine = new ReflectionEngine(config, systemMessage, { model: fake.model });
	return { engine, calls: fake.calls };
}

describe('ReflectionEngine', () => {
	it('runs draft, critique and revision in order', async () => {
		const { engine, calls } = engineWith(['borrador', 'be more formal', 'versión final']);

		const result = await engine.generateText(translation, ['accuracy', 'fluency']);

		expect(result).toBe('versión final');
		expect(calls).toHaveLength(3);
		expect(engine.history).toEqual(['borrador', 'be more formal', 'versión final']);
	});

	it('sends the rendered template verbatim as the draft prompt', async () => {
		const prompt = new PromptTemplate({ persona: 'P.', task: 'T.', context: 'C.', outputFormat: 'JSON' });
		const { engine, calls } = engineWith(['a', 'b', 'c']);

		await engine.generateText(prompt);

		expect(calls[0].prompt).toBe('P.T.C.JSON');
	});

	it('binds the system message to every stage', async () => {
		const { engine, calls } = engineWith(['a', 'b', 'c'], 'You are an expert linguist');

		await engine.generateText(translation);

		expect(calls.map(call => call.system)).toEqual([
			'You are an expert linguist',
			'You are an expert linguist',
			'You are an expert linguist',
		]);
		expect(calls.map(call => call.temperature)).toEqual([0.7, 0.7, 0.7]);
	});

	it('critiques the draft against the numbered criteria', async () => {
		const { engine, calls } = engineWith(['borrador', 'be more formal', 'versión final']);

		await engine.generateText(translation, ['accuracy', 'fluency']);

		const critique = calls[1].prompt;
		expect(critique).toContain('1. accuracy');
		expect(critique).toContain('2. fluency');
		expect(critique).toContain('<FIRST_RESULT>\nborrador\n</FIRST_RESULT>');

		const revision = calls[2].prompt;
		expect(revision).toContain('<FIRST_RESULT>\nborrador\n</FIRST_RESULT>');
		expect(revision).toContain('<EXPERT_SUGGESTIONS>\nbe more formal\n</EXPERT_SUGGESTIONS>');
		expect(revision).toContain('Edit the first result by ensuring:\n1. accuracy\n2. fluency\n');
	});

	it('lets the model pick its own reflection points without criteria', async () => {
		const { engine, calls } = engineWith(['borrador', 'be more formal', 'versión final']);

		await engine.generateText(translation, []);

		expect(calls[1].prompt).toContain('first define four reflection points');
		expect(calls[2].prompt).not.toContain('Edit the first result by ensuring:');
	});

	it('replaces history on every run', async () => {
		const { engine } = engineWith(['d1', 'c1', 'r1', 'd2', 'c2', 'r2']);

		expect(engine.history).toEqual([]);
		await engine.generateText(translation);
		await engine.generateText(translation);

		expect(engine.history).toEqual(['d2', 'c2', 'r2']);
	});

	it('keeps the previous history when a later stage fails', async () => {
		const { engine } = engineWith(['d1', 'c1', 'r1', 'd2', new Error('upstream unavailable')]);
		await engine.generateText(translation);

		const error = await engine.generateText(translation).catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(GenerationError);
		expect(error).toMatchObject({
			stage: 'critique',
			message: 'critique stage failed: upstream unavailable',
		});
		expect(engine.history).toEqual(['d1', 'c1', 'r1']);
	});

	it('reports missing credentials as a provider failure, not a generation failure', async () => {
		const { engine } = engineWith([new LoadAPIKeyError({ message: 'no key' })]);

		const error = await engine.generateText(translation).catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(ProviderInitError);
		expect(error).not.toBeInstanceOf(GenerationError);
		expect(error).toMatchObject({
			message: 'no key',
			provider: 'generic',
			stage: 'draft',
			context: { provider: 'generic', stage: 'draft' },
		});
		expect(engine.history).toEqual([]);
	});

	it('uses the criteria as they were when the run started', async () => {
		let releaseDraft: (text: string) => void = () => undefined;
		const draft = new Promise<string>(resolve => {
			releaseDraft = resolve;
		});
		const { engine, calls } = engineWith([draft, 'critique', 'revision']);
		const criteria = ['accuracy', 'fluency'];

		const run = engine.generateText(translation, criteria);
		criteria.push('brevity');
		criteria[0] = 'tone';
		releaseDraft('borrador');
		await run;

		expect(calls[1].prompt).toContain('1. accuracy\n2. fluency\n');
		expect(calls[2].prompt).toContain('Edit the first result by ensuring:\n1. accuracy\n2. fluency\n');
		expect(calls[2].prompt).not.toContain('brevity');
	});

	it('treats an empty revision as a failure', async () => {
		const { engine } = engineWith(['draft', 'critique', '  \n']);

		await expect(engine.generateText(translation)).rejects.toMatchObject({
			name: 'GenerationError',
			stage: 'revision',
		});
		expect(engine.history).toEqual([]);
	});

	it('fails the draft stage when the call is aborted', async () => {
		const { engine } = engineWith(['never sent']);
		const controller = new AbortController();
		controller.abort();

		await expect(engine.generateText(translation, [], { abortSignal: controller.signal }))
			.rejects.toMatchObject({ stage: 'draft' });
		expect(engine.history).toEqual([]);
	});

	it('rejects an overlapping run on the same engine', async () => {
		let releaseDraft: (text: string) => void = () => undefined;
		const draft = new Promise<string>(resolve => {
			releaseDraft = resolve;
		});
		const { engine } = engineWith([draft, 'critique', 'revision']);

		const first = engine.generateText(translation);
		await expect(engine.generateText(translation)).rejects.toBeInstanceOf(EngineBusyError);

		releaseDraft('draft');
		expect(await first).toBe('revision');
		expect(engine.history).toEqual(['draft', 'critique', 'revision']);
	});

	it('refuses an openai config without credentials before any call', () => {
		const fake = createFakeModel(['unused']);

		expect(() => new ReflectionEngine({
			provider: 'openai',
			modelName: 'gpt-4o-mini',
			apiKey: '',
			organization: 'org-test',
		}, 'system', { model: fake.model })).toThrow(ConfigurationError);
		expect(fake.calls).toHaveLength(0);
	});

	it('labels itself with provider and model', () => {
		const { engine } = engineWith([]);

		expect(engine.modelLabel).toBe('generic/gemini-1.5-flash');
	});
});
