import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { LlmClient, LlmRequest } from './llm-client.js';
import { GoldAnswerSchema } from '@graphgate/schemas/src/evaluation.schema.js';
import { createChildLogger } from '@graphgate/shared/src/logger.js';
import { AgentError } from '@graphgate/shared/src/utils/errors.js';

const log = createChildLogger('llm:verdict-request');

const DEFAULT_MAX_RETRIES = 1;

export const VerdictSchema = z.object({
  answer: GoldAnswerSchema,
  reasoning: z.string().nullish(),
});

export type Verdict = z.infer<typeof VerdictSchema>;

const VerdictJsonSchema = zodToJsonSchema(VerdictSchema, {
  name: 'Verdict',
  $refStrategy: 'none',
});

export interface VerdictInput {
  readonly question: string;
  readonly facts?: readonly string[];
  /** Rendered graph context, if any. */
  readonly context?: string;
}

export interface RequestVerdictOptions extends VerdictInput {
  readonly llmClient: LlmClient;
  readonly maxRetries?: number;
}

const SYSTEM_PROMPT = `You are a verdict agent answering yes/no questions strictly from the evidence provided.

Rules:
- Answer ONLY based on the facts and graph context given
- "YES": the evidence supports the statement in the question
- "NO": the evidence contradicts it
- "UNKNOWN": the evidence does not settle it

Respond with a JSON object: {"answer": "YES" | "NO" | "UNKNOWN", "reasoning": "<one sentence>"}`;

export function buildVerdictRequest(input: VerdictInput): LlmRequest {
  const sections: string[] = [];
  if (input.facts && input.facts.length > 0) {
    sections.push(['FACTS:', ...input.facts.map((fact, i) => `${String(i + 1)}. ${fact}`)].join('\n'));
  }
  if (input.context) {
    sections.push(`GRAPH CONTEXT:\n${input.context}`);
  }
  sections.push(`QUESTION: ${input.question}`);

  return {
    systemPrompt: SYSTEM_PROMPT,
    userMessage: sections.join('\n\n'),
    jsonSchema: VerdictJsonSchema,
  };
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Bare one-word replies such as "Yes." are still common; map them to an answer. */
export function answerFromText(text: string): Verdict['answer'] | null {
  const upper = text.toUpperCase();
  if (/\bYES\b/.test(upper)) return 'YES';
  if (/\bUNKNOWN\b|\bDON'T KNOW\b/.test(upper)) return 'UNKNOWN';
  if (/\bNO\b/.test(upper)) return 'NO';
  return null;
}

/**
 * Pulls a verdict payload out of a reply: the whole reply as JSON, a fenced
 * block, the outermost braces, and finally a bare keyword.
 */
export function extractVerdictPayload(content: string): unknown {
  const trimmed = content.trim();
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(trimmed)?.[1];
  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  const braced = start >= 0 && end > start ? trimmed.slice(start, end + 1) : undefined;

  for (const candidate of [trimmed, fenced, braced]) {
    if (candidate === undefined) continue;
    const parsed = tryParse(candidate.trim());
    if (parsed !== undefined && typeof parsed !== 'string') return parsed;
  }

  const answer = answerFromText(trimmed);
  return answer === null ? undefined : { answer };
}

/**
 * Asks the collaborator for a YES/NO/UNKNOWN verdict; a reply that fails
 * validation gets one correction round by default.
 */
export async function requestVerdict(options: RequestVerdictOptions): Promise<Verdict> {
  const { llmClient, maxRetries = DEFAULT_MAX_RETRIES } = options;
  const request = buildVerdictRequest(options);

  let lastErrors: string[] = [];

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const currentRequest: LlmRequest =
      attempt === 0
        ? request
        : {
            ...request,
            userMessage: `${request.userMessage}\n\n[CORRECTION] Your previous response had validation errors. Please fix these issues and respond with valid JSON:\n${lastErrors.map((e) => `- ${e}`).join('\n')}`,
          };

    const response = await llmClient.invoke(currentRequest);
    const payload = extractVerdictPayload(response.content);
    if (payload === undefined) {
      lastErrors = [`No verdict found in response: ${response.content.slice(0, 100)}`];
      log.warn({ attempt: attempt + 1, errors: lastErrors }, 'Verdict parse failed, retrying with correction');
      continue;
    }

    const result = VerdictSchema.safeParse(payload);
    if (result.success) {
      return result.data;
    }

    lastErrors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    log.warn({ attempt: attempt + 1, errors: lastErrors }, 'Verdict validation failed, retrying with correction');
  }

  throw new AgentError(
    `Verdict agent returned invalid output after ${String(maxRetries + 1)} attempts: ${lastErrors.join(', ')}`,
  );
}
