/**
 * SERVICE WIRING
 *
 * Builds every pipeline component once from AppConfig and hands them out by
 * reference. Tests replace the transport, LLM client, clock or facility
 * store through overrides; nothing here reads process.env.
 */

import { ResponseCache, systemClock, type Clock } from "@core/cache/response-cache";
import { GuidanceSynthesizer } from "@core/guidance";
import { GeminiEmbedder, loadPassageCorpus, PassageIndex, type GuidancePassage } from "@core/knowledge";
import { createGeminiClient, createNullLLMClient, type LLMClient } from "@core/llm/client";
import { createLogger, type Logger } from "@core/logger";
import { TripSessionStore } from "@core/trip";
import {
  createHttpTransport,
  SeoulCatalogAdapter,
  SeoulLiveAdapter,
  UpstreamClient,
  type NormalizedRows,
  type Transport,
} from "../packages/providers";
import { CheckpointGuidanceService } from "./checkpoint-guidance";
import type { AppConfig } from "./config";
import { MemFacilityStore, type IFacilityStore } from "./facility-store";
import { LiveStatusService } from "./live-status";
import { TripAssemblyService } from "./trip-assembly";

export interface ServiceOverrides {
  transport?: Transport;
  llm?: LLMClient;
  clock?: Clock;
  facilities?: IFacilityStore;
  passages?: readonly GuidancePassage[];
  logger?: Logger;
}

export interface Services {
  config: AppConfig;
  logger: Logger;
  cache: ResponseCache<NormalizedRows>;
  upstream: UpstreamClient;
  llm: LLMClient;
  facilities: IFacilityStore;
  liveStatus: LiveStatusService;
  sessions: TripSessionStore;
  index: PassageIndex;
  trips: TripAssemblyService;
  guidance: CheckpointGuidanceService;
}

function resolveLLM(config: AppConfig, logger: Logger): LLMClient {
  if (!config.gemini.apiKey) {
    logger.warn("AI_INTEGRATIONS_GEMINI_API_KEY not set: template-only guidance, lexical retrieval");
    return createNullLLMClient("API key not configured");
  }
  return createGeminiClient({
    apiKey: config.gemini.apiKey,
    baseUrl: config.gemini.baseUrl,
    model: config.gemini.model,
    embeddingModel: config.gemini.embeddingModel,
  });
}

export async function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Promise<Services> {
  const logger = overrides.logger ?? createLogger("B-FAI", { debug: config.debug });
  const clock = overrides.clock ?? systemClock;

  const cache = new ResponseCache<NormalizedRows>({
    maxEntries: config.cacheMaxEntries,
    clock,
    logger: logger.child("Cache"),
  });

  const upstream = new UpstreamClient({
    catalog: new SeoulCatalogAdapter(
      { ...config.catalog, timeoutMs: config.upstreamTimeoutMs },
      logger.child("CatalogAdapter")
    ),
    live: new SeoulLiveAdapter(
      { ...config.realtime, timeoutMs: config.upstreamTimeoutMs },
      logger.child("LiveAdapter")
    ),
    transport: overrides.transport ?? createHttpTransport(logger.child("Upstream")),
    cache,
    logger: logger.child("Upstream"),
  });

  const llm = overrides.llm ?? resolveLLM(config, logger);

  const index = await PassageIndex.build(overrides.passages ?? loadPassageCorpus(), {
    primary: llm.isAvailable() ? new GeminiEmbedder(llm) : undefined,
    logger: logger.child("Knowledge"),
  });

  const facilities = overrides.facilities ?? MemFacilityStore.fromFile();
  const liveStatus = new LiveStatusService(upstream, logger.child("LiveStatus"));
  const sessions = new TripSessionStore({ clock, logger: logger.child("Trips") });

  const synthesizer = new GuidanceSynthesizer({
    llm,
    narrativeTimeoutMs: config.narrativeTimeoutMs,
    logger: logger.child("Guidance"),
  });

  return {
    config,
    logger,
    cache,
    upstream,
    llm,
    facilities,
    liveStatus,
    sessions,
    index,
    trips: new TripAssemblyService({ facilities, liveStatus, sessions, logger: logger.child("TripAssembly") }),
    guidance: new CheckpointGuidanceService({
      facilities,
      liveStatus,
      sessions,
      index,
      synthesizer,
      retrievalTimeoutMs: config.retrievalTimeoutMs,
      logger: logger.child("Guidance"),
    }),
  };
}
