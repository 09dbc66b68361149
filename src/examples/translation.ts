/**
 * TRANSLATION EXAMPLE
 *
 * Translates a short English text to Spanish, then has the model review its
 * own translation against four explicit criteria before producing the final one.
 *
 * KEY CONCEPTS:
 * - Caller-supplied reflection criteria, numbered in the critique prompt
 * - Persona reused as the system message
 *
 * Run with: npx tsx src/examples/translation.ts
 */

import { loadProviderConfig, showProgressIndicators } from '../setup';
import { PromptTemplate, ReflectionEngine } from '../index';

const sourceLang = 'English';
const targetLang = 'Spanish';
const sourceText = `Tide pools form where the ocean retreats twice a day and leaves water trapped between rocks.
Anemones, crabs and small fish live there, adapted to sun, waves and sudden changes in salt.`;

const persona = 'You are an expert linguist, specializing in translation. ';

const prompt = new PromptTemplate({
	persona,
	task: `This is an ${sourceLang} to ${targetLang} translation, please provide the ${targetLang} translation for this text.\n${sourceLang}: ${sourceText}\n${targetLang}:`,
	outputFormat: '\nDo not provide any explanations or text apart from the translation.',
});

const engine = new ReflectionEngine(loadProviderConfig(), persona, {
	showProgress: showProgressIndicators(),
});

const translation = await engine.generateText(prompt, [
	'accuracy (by correcting errors of addition, mistranslation, omission, or untranslated text)',
	`fluency (by applying ${targetLang} grammar, spelling and punctuation rules, and ensuring there are no unnecessary repetitions)`,
	'style (by ensuring the translation reflects the style of the source text and takes into account any cultural context)',
	`terminology (by ensuring terminology use is consistent and reflects the source text domain, using equivalent ${targetLang} idioms)`,
]);

console.log('*'.repeat(10));
console.log(translation);
