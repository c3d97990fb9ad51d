export const FunHalfFeedEnvs = {
  FUN_HALF_TIME_ZONE: "FUN_HALF_TIME_ZONE",
  FUN_HALF_CHANNEL_HANDLE: "FUN_HALF_CHANNEL_HANDLE",
  FUN_HALF_OUTPUT_PATH: "FUN_HALF_OUTPUT_PATH",
  FUN_HALF_FEED_URL: "FUN_HALF_FEED_URL",
  FUN_HALF_CUTOFF: "FUN_HALF_CUTOFF",
  FUN_HALF_YT_DLP_PATH: "FUN_HALF_YT_DLP_PATH",
  FUN_HALF_DEBUG: "FUN_HALF_DEBUG",
} as const;
