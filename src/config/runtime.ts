/**
 * Runtime settings that are not part of the user-editable config file.
 */
export const runtimeConfig = {
  download: {
    timeoutMs: 120 * 1000,        // Total budget for one archive request
    userAgent: 'site-archiver/1.0',
    snippetBytes: 512,            // Body excerpt kept for non-2xx responses
  },

  runner: {
    defaultMaxParallel: 5,
    maxParallelEnv: 'SITE_ARCHIVER_MAX_PARALLEL',
  },

  scheduler: {
    minuteMs: 60 * 1000,
    eventBufferSize: 8,
  },

  storage: {
    tempFileMaxAgeMs: 60 * 60 * 1000, // Leftover .tmp files older than this are removed at startup
  },

  env: {
    configPath: 'SITE_ARCHIVER_CONFIG',
    logPath: 'SITE_ARCHIVER_LOG',
    logLevel: 'LOG_LEVEL',
  },
};
