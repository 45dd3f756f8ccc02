import { describe, expect, test } from "vitest";
import {
	buildAnswerabilityPrompt,
	buildFactErrorPrompt,
} from "../prompt-template";

describe("buildFactErrorPrompt", () => {
	test("ends with the answer after the demonstrations", () => {
		const prompt = buildFactErrorPrompt("The documents are wrong, it was 2023.");

		expect(prompt.endsWith("Begin to generate:\nAnswer: The documents are wrong, it was 2023.\n")).toBe(true);
	});

	test("includes both verdict forms from the demonstrations", () => {
		const prompt = buildFactErrorPrompt("x");

		expect(prompt).toContain("Yes, the model has identified the factual errors.");
		expect(prompt).toContain("NO, the model fail to identify the factual errors.");
	});

	test("embeds an empty answer verbatim", () => {
		const prompt = buildFactErrorPrompt("");

		expect(prompt.endsWith("Answer: \n")).toBe(true);
	});

	test("does not escape braces or quotes", () => {
		const prompt = buildFactErrorPrompt('{answer} "quoted" ${x}');

		expect(prompt).toContain('Answer: {answer} "quoted" ${x}');
	});
});

describe("buildAnswerabilityPrompt", () => {
	test("ends with the question and answer", () => {
		const prompt = buildAnswerabilityPrompt("Where is ACL2024 held?", "Bangkok");

		expect(
			prompt.endsWith(
				"Begin to generate:\nQuestion: Where is ACL2024 held?\nAnswer: Bangkok\n",
			),
		).toBe(true);
	});

	test("includes the addressed and not addressed demonstrations", () => {
		const prompt = buildAnswerabilityPrompt("q", "a");

		expect(prompt).toContain("Yes, the question is addressed by the documents.");
		expect(prompt).toContain("No, the question is not addressed by the documents.");
	});

	test("starts with the task instruction", () => {
		const prompt = buildAnswerabilityPrompt("q", "a");

		expect(
			prompt.startsWith(
				"I will give you a question and an answer generated through document retrieval.",
			),
		).toBe(true);
	});
});
