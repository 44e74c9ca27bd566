import * as path from 'path';
import * as fs from 'fs';
import * as dotenv from 'dotenv';
import cron from 'node-cron';
import { z } from 'zod';

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const selectorSchema = z.string().trim().min(1);
const attributeConditionSchema = z.union([
  z.string().min(1),
  z.object({ name: z.string().min(1), value: z.string().optional() }).strict(),
]);

const conditionsSchema = z.object({
  has_child: selectorSchema.optional(),
  not_has_child: selectorSchema.optional(),
  has_attribute: attributeConditionSchema.optional(),
  not_has_attribute: attributeConditionSchema.optional(),
  has_text: z.string().min(1).optional(),
  not_has_text: z.string().min(1).optional(),
}).strict();

const linkFilterSchema = z.union([
  z.string(),
  z.object({
    selector: z.string().optional(),
    conditions: conditionsSchema.optional(),
  }).strict(),
]);

const fieldRuleSchema = z.object({
  linkIndex: z.number().int().min(0),
  descendantSelector: z.string().optional(),
  classPattern: z.string().optional(),
  maxLength: z.number().int().positive().optional(),
}).strict();

const simpleExtractionSchema = z.object({
  strategy: z.literal('simple'),
  title: selectorSchema,
  company: z.string().optional(),
  link: z.string().optional(),
  detail: z.string().optional(),
}).strict();

const structuredExtractionSchema = z.object({
  strategy: z.literal('structured'),
  linkFilter: linkFilterSchema,
  linkFilterCondition: z.string().optional(),
  title: fieldRuleSchema.optional(),
  company: fieldRuleSchema.optional(),
  link: z.object({
    linkIndex: z.number().int().min(0).optional(),
    attribute: z.string().min(1).optional(),
  }).strict().optional(),
  detail: z.union([z.string(), fieldRuleSchema]).optional(),
}).strict();

const siteSchema = z.object({
  name: z.string().trim().min(1),
  enabled: z.boolean().default(true),
  baseUrl: z.string().url().optional(),
  urlTemplate: z.string().url(),
  jobList: selectorSchema,
  extraction: z.discriminatedUnion('strategy', [simpleExtractionSchema, structuredExtractionSchema]),
  pagination: z.object({
    param: z.string().min(1),
    maxPages: z.number().int().positive().default(1),
  }).optional(),
  pageDelayMs: z.number().int().min(0).optional(),
});

function isTimeZone(name: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: name });
    return true;
  } catch {
    return false;
  }
}

const timeOfDaySchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM');

const scheduleSchema = z.object({
  cronExpression: z.string().refine(expr => cron.validate(expr), 'invalid cron expression').optional(),
  times: z.array(timeOfDaySchema).optional(),
  startTime: timeOfDaySchema.optional(),
  endTime: timeOfDaySchema.optional(),
  intervalMinutes: z.number().int().positive().default(60),
  timezone: z.string().refine(isTimeZone, 'unknown time zone').default('Asia/Seoul'),
}).refine(s => !s.startTime === !s.endTime, 'startTime and endTime must be set together');

const notificationsSchema = z.object({
  terminal: z.boolean().default(true),
  file: z.object({
    enabled: z.boolean().default(false),
    outputDir: z.string().default('output'),
    format: z.enum(['json', 'txt']).default('json'),
  }).default({}),
  email: z.object({
    enabled: z.boolean().default(false),
    smtpServer: z.string().min(1).default('smtp.gmail.com'),
    smtpPort: z.number().int().positive().default(587),
    fromEmail: z.string().optional(),
    toEmail: z.string().optional(),
    password: z.string().optional(),
  }).default({}),
  telegram: z.object({
    enabled: z.boolean().default(false),
  }).default({}),
});

const appSchema = z.object({
  sites: z.array(z.unknown()).default([]),
  jobKeywords: z.array(z.string()).min(1, 'at least one keyword is required'),
  excludeKeywords: z.array(z.string()).default([]),
  similarityThreshold: z.number().min(0).max(1).default(0.3),
  schedule: scheduleSchema.default({}),
  notifications: notificationsSchema.default({}),
  database: z.object({
    path: z.string().default('data/jobs.db'),
  }).default({}),
});

export type SiteConfig = z.infer<typeof siteSchema>;
export type ScheduleConfig = z.infer<typeof scheduleSchema>;
export type NotificationsConfig = z.infer<typeof notificationsSchema>;

export interface InvalidSite {
  name: string;
  message: string;
}

export interface AppConfig extends Omit<z.infer<typeof appSchema>, 'sites'> {
  sites: SiteConfig[];
  /** Site entries that failed validation; they are skipped for the run. */
  invalidSites: InvalidSite[];
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function siteLabel(raw: unknown, index: number): string {
  if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string' && raw.name) {
    return raw.name;
  }
  return `sites[${index}]`;
}

export function parseConfig(data: unknown): AppConfig {
  const parsed = appSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }

  const sites: SiteConfig[] = [];
  const invalidSites: InvalidSite[] = [];
  parsed.data.sites.forEach((raw, index) => {
    const site = siteSchema.safeParse(raw);
    if (site.success) {
      sites.push(site.data);
    } else {
      invalidSites.push({ name: siteLabel(raw, index), message: describeIssues(site.error) });
    }
  });

  return { ...parsed.data, sites, invalidSites };
}

export function resolveConfigPath(): string {
  return path.resolve(process.cwd(), process.env.CONFIG_PATH || 'config.json');
}

export function loadConfig(configPath: string = resolveConfigPath()): AppConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${configPath}: ${reason}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${reason}`);
  }

  return parseConfig(data);
}

export function getTelegramToken(): string {
  const token = process.env.TELEGRAM_BOT_TOKEN;
  if (!token) throw new ConfigError('TELEGRAM_BOT_TOKEN is not set in .env');
  return token;
}
