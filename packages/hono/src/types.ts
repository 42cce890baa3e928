import type { OpenAPIHono } from "@hono/zod-openapi";
import type { LanguageModel } from "ai";
import type { DecisionOracle, Engine, StorageProvider } from "@resdesk/core";
import type { FundingSearchOptions, RecordStore } from "@resdesk/research";
import type { OpenAPIConfig } from "./lib/configure-openapi.js";

export interface ResearchPluginConfig {
  /** Chat model the default oracle calls. Required unless `oracle` is given. */
  model?: LanguageModel;
  /** Replaces the model-backed oracle, e.g. a scripted one in tests */
  oracle?: DecisionOracle;
  /** Session storage. Defaults to in-memory (ephemeral) if omitted. */
  storage?: StorageProvider;
  /** Project and person records. Defaults to in-memory if omitted. */
  records?: RecordStore;
  funding?: FundingSearchOptions;
  appName?: string;
  maxSteps?: number;
  openapi?: OpenAPIConfig;
}

export interface ResearchPluginInstance {
  app: OpenAPIHono;
  engine: Engine;
  records: RecordStore;
}
