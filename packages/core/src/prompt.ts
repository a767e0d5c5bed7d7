import { ValidationError } from "@profile-rag/errors";

export interface PromptVariables {
  context: string;
  question: string;
}

const PLACEHOLDER = /\{(context|question)\}/g;

export function validatePromptTemplate(template: string): void {
  const missing = ["{context}", "{question}"].filter((p) => !template.includes(p));
  if (missing.length > 0) {
    throw new ValidationError(`Prompt template is missing ${missing.join(" and ")}`, {
      template: `missing ${missing.join(", ")}`,
    });
  }
}

/**
 * Substitute `{context}` and `{question}` in one pass, so braces inside the
 * retrieved text are never expanded.
 */
export function renderPrompt(template: string, variables: PromptVariables): string {
  validatePromptTemplate(template);
  return template.replace(PLACEHOLDER, (_match, key: string) =>
    key === "context" ? variables.context : variables.question,
  );
}
