/**
 * Zod schemas for runtime validation of configuration and credential files
 * These schemas enforce the file contracts at runtime and fill in defaults
 * for every omitted configuration field.
 */

import { z } from 'zod';

/**
 * A1 column letters, e.g. 'A' or 'AB'
 */
const ColumnLetterSchema = z
  .string()
  .regex(/^[A-Z]{1,3}$/, { message: 'Column must be upper-case A1 letters (e.g., "B")' });

export const ExtractionStrategySchema = z.enum(['columns', 'search']);

export const SheetSectionSchema = z
  .object({
    label: z.string().min(1, 'Section label is required'),
    startRow: z.number().int().positive(),
    endRow: z.number().int().positive(),
  })
  .refine((section) => section.endRow >= section.startRow, {
    message: 'endRow must not be before startRow',
    path: ['endRow'],
  });

export const DEFAULT_DAY_COLUMNS: Array<[string, string]> = [
  ['A', 'B'],
  ['C', 'D'],
  ['E', 'F'],
  ['G', 'H'],
  ['I', 'J'],
  ['K', 'L'],
  ['M', 'N'],
];

export const SheetLayoutSchema = z.object({
  dateRow: z.number().int().positive().default(5),
  dayColumns: z
    .array(z.tuple([ColumnLetterSchema, ColumnLetterSchema]))
    .min(1)
    .default(DEFAULT_DAY_COLUMNS),
  sections: z
    .array(SheetSectionSchema)
    .min(1)
    .default([
      { label: 'customer-service', startRow: 7, endRow: 15 },
      { label: 'ticket-agent', startRow: 24, endRow: 31 },
    ]),
  annotationTags: z.array(z.string().min(1)).default(['PLAKATY']),
});

export const EventSettingsSchema = z.object({
  summary: z.string().min(1).default('Workshift'),
  location: z.string().default(''),
  timeZone: z.string().min(1).default('Europe/Warsaw'),
  reminderMinutes: z.number().int().nonnegative().max(40320).default(15),
  calendarId: z.string().min(1).default('primary'),
});

export const OAuthAuthSettingsSchema = z.object({
  mode: z.literal('oauth'),
  clientSecretPath: z.string().min(1).default('client_secret.json'),
  tokenPath: z.string().min(1).default('token.json'),
});

export const ServiceAccountAuthSettingsSchema = z.object({
  mode: z.literal('service-account'),
  keyFilePath: z.string().min(1).default('service_account.json'),
  subject: z.string().email().optional(),
});

export const AuthSettingsSchema = z.discriminatedUnion('mode', [
  OAuthAuthSettingsSchema,
  ServiceAccountAuthSettingsSchema,
]);

/**
 * Configuration file schema; `{}` is a valid file
 */
export const SchedulerConfigSchema = z.object({
  worksheet: z.string().min(1).default('PT-CZW'),
  layout: SheetLayoutSchema.default({}),
  event: EventSettingsSchema.default({}),
  auth: AuthSettingsSchema.default({ mode: 'oauth' }),
  strategy: ExtractionStrategySchema.default('columns'),
});

/**
 * OAuth client secret as downloaded from the Cloud console
 */
const OAuthClientSchema = z.object({
  client_id: z.string().min(1, 'client_id is required'),
  client_secret: z.string().min(1, 'client_secret is required'),
  redirect_uris: z.array(z.string()).default([]),
});

export const OAuthClientSecretSchema = z
  .object({
    installed: OAuthClientSchema.optional(),
    web: OAuthClientSchema.optional(),
  })
  .refine((secret) => secret.installed !== undefined || secret.web !== undefined, {
    message: 'Client secret must contain an "installed" or "web" section',
  })
  .transform((secret, ctx) => {
    const client = secret.installed ?? secret.web;
    if (!client) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Missing client section' });
      return z.NEVER;
    }
    return client;
  });

/**
 * Cached OAuth token. Accepts both the googleapis credential shape and the
 * authorized-user shape written by other quickstart clients.
 */
export const StoredTokenSchema = z
  .object({
    access_token: z.string().optional(),
    token: z.string().optional(),
    refresh_token: z.string().optional(),
    scope: z.string().optional(),
    token_type: z.string().optional(),
    expiry_date: z.number().optional(),
    expiry: z.string().optional(),
  })
  .transform((token) => {
    const expiryFromIso = token.expiry ? Date.parse(token.expiry) : Number.NaN;
    return {
      access_token: token.access_token ?? token.token,
      refresh_token: token.refresh_token,
      scope: token.scope,
      token_type: token.token_type,
      expiry_date: token.expiry_date ?? (Number.isNaN(expiryFromIso) ? undefined : expiryFromIso),
    };
  });

export const ServiceAccountKeySchema = z.object({
  type: z.literal('service_account'),
  client_email: z.string().email(),
  private_key: z.string().min(1, 'private_key is required'),
  private_key_id: z.string().optional(),
  project_id: z.string().optional(),
});

// Type exports inferred from schemas
export type ValidatedSchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type SchedulerConfigInput = z.input<typeof SchedulerConfigSchema>;
export type ValidatedOAuthClient = z.infer<typeof OAuthClientSecretSchema>;
export type ValidatedStoredToken = z.infer<typeof StoredTokenSchema>;
export type ValidatedServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;

/**
 * Validate a configuration object and apply defaults
 * @throws ZodError if validation fails
 */
export function validateConfig(data: unknown): ValidatedSchedulerConfig {
  return SchedulerConfigSchema.parse(data);
}

/**
 * Validate a configuration object safely (returns result object)
 */
export function safeValidateConfig(
  data: unknown
): z.SafeParseReturnType<SchedulerConfigInput, ValidatedSchedulerConfig> {
  return SchedulerConfigSchema.safeParse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
