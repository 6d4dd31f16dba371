import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

const percentThreshold = z.number().min(0).max(100);

export const alertThresholdsSchema = z.object({
  cpu: percentThreshold,
  memory: percentThreshold,
  disk: percentThreshold,
});

export const monitorConfigSchema = z.object({
  interval: z.number().int().positive(),
  continuous: z.boolean(),
  thresholds: alertThresholdsSchema,
  reportDir: z.string().min(1),
  logDir: z.string().min(1),
  metricsFile: z.string().min(1),
  dashboardFile: z.string().min(1),
  logFile: z.string().min(1),
  privileged: z.boolean(),
  precision: z.boolean(),
  logLevel: z.enum(LOG_LEVELS),
});

export type ValidatedMonitorConfig = z.infer<typeof monitorConfigSchema>;
