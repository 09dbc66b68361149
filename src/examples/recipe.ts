/**
 * RECIPE EXAMPLE
 *
 * Asks for a recipe twice with the same engine: once with explicit reflection
 * points, once letting the model choose its own four points.
 *
 * KEY CONCEPTS:
 * - Empty criteria switches the critique to self-defined reflection points
 * - History holds only the latest run: [draft, critique, revision]
 *
 * Run with: npx tsx src/examples/recipe.ts
 */

import { loadProviderConfig, showProgressIndicators } from '../setup';
import { PromptTemplate, ReflectionEngine } from '../index';

const country = 'Mexico';
const ingredients = ['rice', 'meat', 'vegetables'];

const persona = `You are an expert cook and the best chef. You are from ${country}. `;

const prompt = new PromptTemplate({
	persona,
	task: `Create 1 recipe with these food ingredients: ${ingredients.join(', ')}. `,
	outputFormat: 'Answer in JSON.',
});

const engine = new ReflectionEngine(loadProviderConfig(), persona, {
	showProgress: showProgressIndicators(),
});

const printRun = (title: string, result: string) => {
	console.log('*'.repeat(30));
	console.log(title);
	console.log(JSON.stringify(engine.history, null, 2));
	console.log('*'.repeat(30));
	console.log(result);
};

// 1. With reflection points
const guided = await engine.generateText(prompt, [
	'feasibility of the recipe (availability of ingredients, cooking techniques)',
	`cooking techniques (are there specific ways dishes are prepared in ${country}?)`,
	'flavors (is the cuisine known for being spicy, savory, sweet, or something else entirely?)',
	`presentation (how is food typically presented in ${country}?)`,
]);
printRun('History (guided)', guided);

// 2. Without reflection points - the model defines its own
const unguided = await engine.generateText(prompt);
printRun('History (self-defined points)', unguided);
