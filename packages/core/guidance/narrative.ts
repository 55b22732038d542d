/**
 * NARRATIVE GENERATION
 *
 * Rewrites the template body into friendlier spoken Korean with the text
 * model. Runs under an explicit budget and returns a typed outcome; the
 * synthesizer keeps the template whenever the outcome is not "generated".
 */

import { SynthesisTimeout } from "../errors";
import type { LLMClient } from "../llm/client";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import { withTimeout } from "../utils/timeout";

export const DEFAULT_NARRATIVE_TIMEOUT_MS = 4000;
const MAX_NARRATIVE_LENGTH = 1200;

export type NarrativeOutcome =
  | { status: "generated"; text: string }
  | { status: "skipped"; reason: string }
  | { status: "failed"; reason: string };

export interface NarrativeRequest {
  checkpointLabel: string;
  stationName: string;
  body: readonly string[];
  passages: readonly string[];
}

const SYSTEM_INSTRUCTION = `당신은 노인과 휠체어 사용자를 위한 지하철 이동 안내 도우미입니다.
규칙:
1. 존댓말을 사용하세요.
2. 2~4문장으로 짧고 분명하게 말하세요.
3. 위치와 방향은 구체적으로 말하세요.
4. 엘리베이터 정보를 먼저 안내하세요.
5. 층수, 거리, 시간, 출구 번호, 칸 번호 같은 숫자는 주어진 그대로 유지하세요.
6. 주어진 정보에 없는 사실은 만들지 마세요.
7. 어려운 용어는 쉬운 말로 바꾸세요.`;

export function buildNarrativePrompt(request: NarrativeRequest): string {
  const lines = [
    `체크포인트: ${request.checkpointLabel}`,
    `역: ${request.stationName}`,
    "",
    "안내 정보:",
    ...request.body,
  ];
  if (request.passages.length > 0) {
    lines.push("", "참고 자료:", ...request.passages.map((p) => `- ${p}`));
  }
  lines.push("", "위 안내 정보를 음성으로 읽기 좋은 하나의 안내문으로 다시 써주세요.");
  return lines.join("\n");
}

/** Every number in the source must survive the rewrite */
export function keepsAllNumbers(source: string, rewritten: string): boolean {
  const numbers = source.match(/\d+/g) ?? [];
  const present = new Set(rewritten.match(/\d+/g) ?? []);
  return numbers.every((n) => present.has(n));
}

export async function generateNarrative(
  llm: LLMClient,
  request: NarrativeRequest,
  timeoutMs: number = DEFAULT_NARRATIVE_TIMEOUT_MS,
  logger: Logger = silentLogger
): Promise<NarrativeOutcome> {
  if (!llm.isAvailable()) {
    return { status: "skipped", reason: "text model not configured" };
  }
  if (request.body.length === 0) {
    return { status: "skipped", reason: "nothing to rewrite" };
  }

  const prompt = buildNarrativePrompt(request);
  const outcome = await withTimeout(
    (signal) => llm.generate(prompt, { signal, systemInstruction: SYSTEM_INSTRUCTION, temperature: 0.3 }),
    timeoutMs
  );

  switch (outcome.status) {
    case "timeout": {
      const error = new SynthesisTimeout(timeoutMs);
      logger.warn(error.message);
      return { status: "failed", reason: error.message };
    }
    case "error":
      logger.warn("Narrative generation failed", { error: outcome.error.message });
      return { status: "failed", reason: outcome.error.message };
    case "ok": {
      const text = outcome.value.trim();
      if (text.length === 0 || text.length > MAX_NARRATIVE_LENGTH) {
        return { status: "failed", reason: `unusable length ${text.length}` };
      }
      if (!keepsAllNumbers(request.body.join(" "), text)) {
        logger.warn("Narrative dropped a number, keeping the template");
        return { status: "failed", reason: "dropped a number from the template" };
      }
      logger.debug(`Narrative generated in ${outcome.elapsedMs}ms`);
      return { status: "generated", text };
    }
  }
}
