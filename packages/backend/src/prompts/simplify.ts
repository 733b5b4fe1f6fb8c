const SIMPLIFY_SYSTEM_PROMPT = `
You are a legal document simplifier. Rewrite the legal document section you are given in plain, easy-to-understand language.

Rules:
1. Preserve the legal meaning: every obligation, right, deadline, amount and condition must survive.
2. Prefer short sentences and everyday words; explain unavoidable legal terms in passing.
3. Keep the order of the original and keep headings or numbering where they help.
4. Do not add advice, opinions or information that is not in the section.
5. Reply with the simplified text only.
`.trim();

export function buildSimplifySystemPrompt(): string {
  return SIMPLIFY_SYSTEM_PROMPT;
}

export function buildSimplifyUserPrompt(section: string): string {
  return `Document section:\n${section}`;
}
