/**
 * zod schema for the JSON rule document passed with `--config`.
 *
 * Key names follow the document format (snake_case); `loadRulesConfig`
 * maps the parsed document onto the camelCase types in ./types.ts.
 */

import { z } from 'zod';

const emailAddress = z
  .string()
  .trim()
  .regex(/^[^@\s]+@[^@\s]+$/, 'must be an email address');

const recipients = z.array(emailAddress).min(1, 'must list at least one recipient');

const thresholds = z
  .array(
    z
      .number()
      .finite()
      .min(0, 'thresholds must be between 0 and 100')
      .max(100, 'thresholds must be between 0 and 100'),
  )
  .min(1, 'must list at least one threshold')
  .superRefine((values, ctx) => {
    const seen = new Set<number>();
    values.forEach((value, index) => {
      if (seen.has(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate threshold ${value}`,
          path: [index],
        });
      }
      seen.add(value);
    });
  })
  .transform((values) => [...values].sort((a, b) => a - b));

const customMessage = z.string().default('');

export const quotaRuleSchema = z
  .object({
    thresholds,
    mail_to: recipients,
    custom_msg: customMessage,
    include_capacity: z.boolean().default(false),
  })
  .strict();

export const capacityRuleSchema = z
  .object({
    thresholds,
    mail_to: recipients,
    custom_msg: customMessage,
    // Accepted so capacity rules share the quota rule shape; has no effect
    include_capacity: z.boolean().optional(),
  })
  .strict();

export const replicationRuleSchema = z
  .object({
    mail_to: recipients,
    custom_msg: customMessage,
  })
  .strict();

const quotaRuleGroupSchema = z
  .object({
    rules: z.record(quotaRuleSchema),
  })
  .strict();

export const ruleDocumentSchema = z
  .object({
    cluster_settings: z
      .object({
        cluster_name: z.string().min(1),
        cluster_address: z.string().min(1),
        rest_port: z.coerce.number().int().min(1).max(65535).default(8000),
        username: z.string().min(1),
        password: z.string().optional(),
      })
      .strict(),
    email_settings: z
      .object({
        sender_address: emailAddress,
        server_address: z.string().min(1),
      })
      .strict(),
    quota_rules: z.record(quotaRuleGroupSchema).default({}),
    default_quota_rules: quotaRuleGroupSchema.default({ rules: {} }),
    capacity_rules: z.record(capacityRuleSchema).default({}),
    replication_rules: z.record(replicationRuleSchema).default({}),
  })
  .strict();

export type RuleDocument = z.infer<typeof ruleDocumentSchema>;

/**
 * Directory quota paths are reported with a trailing slash ("/eng/"), so
 * configured paths get one too before they are compared.
 */
export function normalizeQuotaPath(path: string): string {
  const trimmed = path.trim();
  return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
}
