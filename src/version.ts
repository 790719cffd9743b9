/** SDK version string, reported in `User-Agent`. */
export const SDK_VERSION = "0.1.0" as const;
