// src/constants.ts
export const CLI_NAME = "hsts-preload-sync";

// Wget stores preload-derived rows with created=INT32_MAX and max-age=0.
export const PRELOAD_CREATED_SENTINEL = 2_147_483_647;
export const PRELOAD_MAX_AGE = 0;
export const PRELOAD_PORT = 0;

export const FORCE_HTTPS_MODE = "force-https";

export const KNOWN_HOSTS_HEADER: readonly string[] = [
  "# HSTS 1.0 Known Hosts database for GNU Wget.",
  "# Edit at your own risk.",
  "# <hostname>\t<port>\t<incl. subdomains>\t<created>\t<max-age>",
];

export const SOURCE_ACCEPT = "application/json,*/*;q=0.9";
export const MAX_REDIRECTS = 5;
export const SOURCE_TIMEOUT_MS = 60_000;

export const ENV_LOG_LEVEL = "HSTS_SYNC_LOG_LEVEL";
export const ENV_TMPDIR = "HSTS_SYNC_TMPDIR";
export const ENV_TIMEOUT_MS = "HSTS_SYNC_TIMEOUT_MS";
export const ENV_DISABLE_LOG_ECHO = "HSTS_SYNC_DISABLE_LOG_ECHO";
