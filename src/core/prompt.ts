import { ConversationTurn, SearchResult } from '../types';

export const SYSTEM_PROMPT = [
  'You are a document assistant that helps users understand and retrieve information from the documents they uploaded.',
  '',
  'Instructions:',
  '1. Base every answer on the provided document context. Each passage is labelled [Source: filename, Page: number].',
  '2. Mention the document name when you use it (for example "According to Report.pdf ...").',
  '3. Connect related information across sections and documents, and explain complex points plainly.',
  '4. If the context does not contain the answer, say so clearly instead of guessing.',
  '5. Format answers with markdown: headings, bullet or numbered lists and **bold** for emphasis, with blank lines around blocks.',
  '6. Use the conversation history only to resolve references in the new question.'
].join('\n');

export const NO_CONTEXT_NOTICE = 'No document passages matched this question. Answer from the conversation if possible and say that the documents did not cover it.';

export interface ContextPassage {
  source: string;
  page: number | null;
  content: string;
}

/**
 * Everything the generation service receives for one answer
 */
export interface GenerationPrompt {
  system: string;
  context: ContextPassage[];
  history: ConversationTurn[];
  question: string;
}

export interface AssembledPrompt {
  prompt: GenerationPrompt;
  // The retrieved chunks that made it into the prompt, best-first
  included: SearchResult[];
}

/**
 * Take results best-first while their combined text fits the budget.
 * The best result is always kept so a large chunk cannot starve the prompt.
 */
export function selectContext(results: SearchResult[], maxContextChars: number): SearchResult[] {
  const selected: SearchResult[] = [];
  let used = 0;

  for (const result of results) {
    const size = result.chunk.content.length;
    if (selected.length > 0 && used + size > maxContextChars) {
      break;
    }
    selected.push(result);
    used += size;
  }

  return selected;
}

export function assemblePrompt(params: {
  question: string;
  results: SearchResult[];
  history: ConversationTurn[];
  maxContextChars: number;
}): AssembledPrompt {
  const included = selectContext(params.results, params.maxContextChars);

  return {
    prompt: {
      system: SYSTEM_PROMPT,
      context: included.map(({ chunk }) => ({
        source: chunk.filename,
        page: chunk.page,
        content: chunk.content
      })),
      history: params.history,
      question: params.question
    },
    included
  };
}

export function formatContext(passages: ContextPassage[]): string {
  if (passages.length === 0) {
    return NO_CONTEXT_NOTICE;
  }
  return passages
    .map(passage => `[Source: ${passage.source}, Page: ${passage.page ?? 'n/a'}]\n${passage.content}`)
    .join('\n\n---\n\n');
}

export function formatHistory(turns: ConversationTurn[]): string {
  if (turns.length === 0) {
    return '(none)';
  }
  return turns.map(turn => `USER: ${turn.question}\nASSISTANT: ${turn.answer}`).join('\n');
}

/**
 * Render the user message sent alongside the system prompt
 */
export function renderUserMessage(prompt: GenerationPrompt): string {
  return [
    `Context:\n${formatContext(prompt.context)}`,
    `Question: ${prompt.question}`,
    `Chat history (may help):\n${formatHistory(prompt.history)}`
  ].join('\n\n');
}
