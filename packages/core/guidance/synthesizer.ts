/**
 * GUIDANCE SYNTHESIZER
 *
 * synthesize(checkpoint, facility record, live status, passages) → one
 * guidance message with a severity status.
 *
 * 1. Deterministic template for the checkpoint type
 * 2. Live overlay: severity, alerts, alternative route when a required
 *    resource is down
 * 3. Narrative rewrite of the template body (optional, time-boxed)
 * 4. Top retrieved passage appended as a tip when the template is used
 *
 * Alerts are never passed through the text model, so the alternative route
 * (or the statement that none exists) always reaches the rider verbatim.
 */

import type { LLMClient } from "../llm/client";
import { createNullLLMClient } from "../llm/client";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { RetrievalQuery } from "../knowledge/types";
import type { Checkpoint, CheckpointType } from "../trip/types";
import { findAlternativeRoute } from "./alternative-route";
import { assessExit, classifyStatus, type ExitAssessment } from "./live-overlay";
import { DEFAULT_NARRATIVE_TIMEOUT_MS, generateNarrative } from "./narrative";
import { renderAlerts, renderBody } from "./templates";
import type { FacilityRecord, GuidanceResult, LiveStatusSnapshot, SynthesisInput } from "./types";

/** Checkpoints whose guidance depends on one exit being usable */
const EXIT_BOUND: ReadonlySet<CheckpointType> = new Set<CheckpointType>([
  "origin",
  "origin_exit",
  "destination_platform",
  "destination_exit",
]);

export interface GuidanceSynthesizerOptions {
  llm?: LLMClient;
  narrativeTimeoutMs?: number;
  /** Passages blended into one message */
  maxPassages?: number;
  logger?: Logger;
}

export function assessCheckpoint(
  checkpoint: Checkpoint,
  facility: FacilityRecord,
  live: LiveStatusSnapshot,
  needElevator: boolean
): ExitAssessment | null {
  const exitNumber = checkpoint.data.exitNumber;
  if (!exitNumber || !EXIT_BOUND.has(checkpoint.type)) return null;
  return assessExit(exitNumber, facility, live, needElevator);
}

/** Checkpoint type plus the facility attributes worth matching passages on */
export function buildRetrievalQuery(
  checkpoint: Checkpoint,
  facility: FacilityRecord,
  live: LiveStatusSnapshot,
  needElevator: boolean,
  station: string
): RetrievalQuery {
  const assessment = assessCheckpoint(checkpoint, facility, live, needElevator);
  const exit = assessment?.exit;
  const terms = new Set<string>();

  if (needElevator) terms.add("엘리베이터");
  if (checkpoint.data.exitNumber) terms.add("출구");
  if (exit?.hasSlope) terms.add("경사로");
  if (exit?.landmark) terms.add(exit.landmark);
  if (assessment?.block === "closed") ["폐쇄", "공사", "우회"].forEach((t) => terms.add(t));
  if (assessment?.block === "elevator_down") ["점검", "대체"].forEach((t) => terms.add(t));
  for (const platform of facility.platforms) {
    if (platform.platformType) terms.add(platform.platformType);
  }
  if (facility.edges.some((e) => e.platformShape === "곡선")) terms.add("곡선");
  if (live.arrivals.some((a) => a.isLastTrain)) terms.add("막차");
  if (live.arrivals.some((a) => a.trainStatus === "급행" || a.trainStatus === "특급")) terms.add("급행");
  if (checkpoint.type === "charging_station") ["충전", "휠체어"].forEach((t) => terms.add(t));

  return { checkpointType: checkpoint.type, context: Array.from(terms).join(" "), station };
}

export class GuidanceSynthesizer {
  private readonly llm: LLMClient;
  private readonly narrativeTimeoutMs: number;
  private readonly maxPassages: number;
  private readonly logger: Logger;

  constructor(options: GuidanceSynthesizerOptions = {}) {
    this.llm = options.llm ?? createNullLLMClient("narrative disabled");
    this.narrativeTimeoutMs = options.narrativeTimeoutMs ?? DEFAULT_NARRATIVE_TIMEOUT_MS;
    this.maxPassages = options.maxPassages ?? 1;
    this.logger = options.logger ?? silentLogger;
  }

  async synthesize(input: SynthesisInput): Promise<GuidanceResult> {
    const { checkpoint, facility, live, needElevator, trip } = input;

    const assessment = assessCheckpoint(checkpoint, facility, live, needElevator);
    const alternative = assessment ? findAlternativeRoute(assessment, facility, live, needElevator) : null;
    const status = classifyStatus(assessment, live);

    const templateInput = { checkpoint, facility, live, needElevator, trip, assessment };
    const alerts = renderAlerts(templateInput, alternative);
    const body = renderBody(templateInput);
    const passages = input.passages.slice(0, Math.max(0, this.maxPassages));

    const narrative = await generateNarrative(
      this.llm,
      {
        checkpointLabel: checkpoint.label,
        stationName: facility.station.name,
        body,
        passages: passages.map((p) => p.passage.text),
      },
      this.narrativeTimeoutMs,
      this.logger
    );

    let paragraphs: string[];
    if (narrative.status === "generated") {
      paragraphs = [...alerts, narrative.text];
    } else {
      if (narrative.status === "failed") {
        this.logger.info(`Checkpoint ${checkpoint.id}: template guidance (${narrative.reason})`);
      }
      paragraphs = [...alerts, ...body, ...passages.map((p) => `참고: ${p.passage.text}`)];
    }

    if (assessment?.block) {
      this.logger.info(`Checkpoint ${checkpoint.id}: exit ${assessment.exitNumber} ${assessment.block}`, {
        alternative: alternative?.exitNumber ?? null,
      });
    }

    return {
      checkpointId: checkpoint.id,
      checkpointType: checkpoint.type,
      checkpointLabel: checkpoint.label,
      text: paragraphs.join("\n\n"),
      status,
      ...(alternative ? { alternativeRoute: alternative } : {}),
      warnings: [...live.warnings],
      narrative: narrative.status === "generated" ? "generated" : "template",
      passagesUsed: passages.map((p) => p.passage.id),
    };
  }
}
