import { z } from 'zod';
import { parseDuration } from '../utils/parser.js';
import {
  DEFAULT_ALERT_FILE,
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_DIAGNOSTIC_FILE,
  DEFAULT_DISK_THRESHOLD,
  DEFAULT_HOSTS,
  DEFAULT_INTERFACE,
  DEFAULT_INTERVAL,
  DEFAULT_MEM_THRESHOLD,
  DEFAULT_METRICS_FILE,
  DEFAULT_NET_THRESHOLD,
  DEFAULT_PROBE_COUNT,
  DEFAULT_PROBE_TIMEOUT,
  DEFAULT_SAMPLE_WINDOW,
  DEFAULT_TOP_PROCESSES,
} from '../constants.js';

// Bare numbers, and strings of digits only, are seconds in every config layer.
export const durationSchema = z
  .union([z.string().min(1), z.number().int().min(0)])
  .transform((value, ctx) => {
    try {
      if (typeof value === 'number') return value * 1000;
      return /^\d+$/.test(value.trim()) ? Number(value.trim()) * 1000 : parseDuration(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration: "${value}"` });
      return z.NEVER;
    }
  });

const percentSchema = z.number().int().min(0).max(100);

// Passed to ping and sar as an argument, never through a shell, but an
// option-looking value would still be read as a flag.
const notAFlag = (value: string) => !value.startsWith('-');

export const thresholdsSchema = z
  .object({
    cpu_pct: percentSchema.default(DEFAULT_CPU_THRESHOLD),
    disk_pct: percentSchema.default(DEFAULT_DISK_THRESHOLD),
    mem_pct: percentSchema.default(DEFAULT_MEM_THRESHOLD),
    net_kbps: z.number().int().min(0).default(DEFAULT_NET_THRESHOLD),
  })
  .strict();

export const probeSchema = z
  .object({
    count: z.number().int().min(1).max(10).default(DEFAULT_PROBE_COUNT),
    timeout: durationSchema
      .refine((ms) => ms >= 1000, 'probe timeout must be at least 1s')
      .default(DEFAULT_PROBE_TIMEOUT),
  })
  .strict();

export const logFilesSchema = z
  .object({
    dir: z.string().min(1).default('.'),
    metrics_file: z.string().min(1).default(DEFAULT_METRICS_FILE),
    alert_file: z.string().min(1).default(DEFAULT_ALERT_FILE),
    diagnostic_file: z.string().min(1).default(DEFAULT_DIAGNOSTIC_FILE),
  })
  .strict();

export const monitorConfigSchema = z
  .object({
    interval: durationSchema.refine((ms) => ms > 0, 'interval must be positive').default(DEFAULT_INTERVAL),
    interface: z
      .string()
      .regex(/^[A-Za-z0-9_.:@-]{1,32}$/, 'interface must be a network interface name')
      .refine(notAFlag, 'interface must not start with "-"')
      .default(DEFAULT_INTERFACE),
    hosts: z
      .array(z.string().min(1).refine(notAFlag, 'host must not start with "-"'))
      .min(1, 'at least one connectivity host is required')
      .default([...DEFAULT_HOSTS]),
    thresholds: thresholdsSchema.default({}),
    probe: probeSchema.default({}),
    sample_window: durationSchema
      .refine((ms) => ms >= 1000, 'sample_window must be at least 1s')
      .default(DEFAULT_SAMPLE_WINDOW),
    sources: z.enum(['sysstat', 'native']).default('sysstat'),
    logs: logFilesSchema.default({}),
    alert_cooldown: durationSchema.default(0),
    top_processes: z.number().int().min(1).max(50).default(DEFAULT_TOP_PROCESSES),
    log_level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  })
  .strict();

export type RawMonitorConfig = z.input<typeof monitorConfigSchema>;
export type ValidatedMonitorConfig = z.output<typeof monitorConfigSchema>;
