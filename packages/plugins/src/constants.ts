/** Entry-point group under which plugin packages register themselves. */
export const DEFAULT_ENTRY_POINT_GROUP = "r2x_plugin";

export const FALLBACK_LOG_TAG = "plugscan:fallback";

/** Environment variable that opts callers into static discovery. */
export const STATIC_DISCOVERY_ENV = "PLUGSCAN_STATIC_DISCOVERY";
