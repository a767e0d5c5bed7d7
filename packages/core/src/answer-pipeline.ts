import type { AnswerResult, QueryRequest } from "@profile-rag/types";
import type { GenerateOptions, ILlmProvider } from "@profile-rag/llm";
import { retrieve, type RetrievalDependencies } from "./retrieval-pipeline.js";
import { assembleContext } from "./context-assembler.js";
import { renderPrompt } from "./prompt.js";

export interface AnswerDependencies extends RetrievalDependencies {
  llm: ILlmProvider;
  /** Template with `{context}` and `{question}` placeholders. */
  systemPrompt: string;
  generateOptions?: GenerateOptions;
}

/**
 * Answer pipeline: Retrieve -> Assemble Context -> Render Prompt -> Generate
 *
 * With no retrieved chunks the model is still asked, with an empty context,
 * so the prompt's own instructions decide how to say "I don't know".
 */
export async function answer(request: QueryRequest, deps: AnswerDependencies): Promise<AnswerResult> {
  const { chunks } = await retrieve(request, deps);

  const context = assembleContext(chunks, request.contextFormat ?? "plain");
  const prompt = renderPrompt(deps.systemPrompt, { context, question: request.question.trim() });

  const completion = await deps.llm.generate(prompt, deps.generateOptions);
  deps.logger?.info(
    { provider: deps.llm.name, model: completion.model, sources: chunks.length },
    "Answered question",
  );

  return {
    answer: completion.text,
    sources: chunks.map((c) => ({ content: c.content, metadata: c.metadata })),
    model: completion.model,
    provider: deps.llm.name,
  };
}
