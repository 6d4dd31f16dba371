// Keep pino quiet while the suites run.
process.env.HOSTPULSE_LOG_LEVEL = 'silent';
