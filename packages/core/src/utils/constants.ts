/** Well-known tool names used by the engine */
export const TOOL_NAMES = {
  TRANSFER_TO_AGENT: "transferToAgent",
} as const;

/** Default configuration values */
export const DEFAULTS = {
  APP_NAME: "research",
  MAX_STEPS: 10,
  ROLE: "investigator",
  LIST_DISPLAY_LIMIT: 20,
} as const;
