// ESM + NodeNext: include .js on local imports
export {
  LanguageEnum,
  BriefSchema,
  MarketInsightsSchema,
  MarketIntelligenceSchema,
  AngleSchema,
  AnglesSchema,
  CaptionsSchema,
  IdeaSchema,
  IdeasSchema,
} from "./schemas.js";

export type {
  Language,
  Brief,
  MarketInsights,
  MarketIntelligence,
  Angle,
  Captions,
  Idea,
} from "./schemas.js";

export type { MarketContext, Season } from "./context.js";
export type { RawBrief } from "./steps/normalizer.js";

export { system, DEFAULT_MARKET } from "./system.js";

export * as normalizer from "./steps/normalizer.js";
export * as market from "./steps/market.js";
export * as angles from "./steps/angles.js";
export * as ideas from "./steps/ideas.js";
export * as critic from "./steps/critic.js";
export * as compliance from "./steps/compliance.js";
export * as localize from "./steps/localize.js";
