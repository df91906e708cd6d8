/**
 * Zod schemas for the configuration surface the gateway core consumes.
 *
 * Every field has a default, so `{}` parses to a usable configuration.
 */

import { z } from 'zod';

/** A pattern that must compile as a JavaScript regular expression. */
const RegexPattern = z.string().superRefine((pattern, ctx) => {
  try {
    new RegExp(pattern);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid regular expression "${pattern}": ${err instanceof Error ? err.message : String(err)}`,
    });
  }
});

export const AccountSchema = z.object({
  username: z.string().min(1),
  password: z.string(),
  permissions: z.array(z.string()).default(['+']),
  admin: z.boolean().default(false),
});

export const DigestAuthSchema = z
  .object({
    /** When true, Digest is challenged unless the user agent matches disableRule */
    enable: z.boolean().default(false),
    /** With Digest disabled globally, user agents matching this still get Digest */
    enableRule: RegexPattern.default(''),
    disableRule: RegexPattern.default('neon/'),
  })
  .default({});

export const CompressLevelSchema = z.enum(['fast', 'default', 'best']);

export const CompressionSchema = z
  .object({
    enableGzip: z.boolean().default(true),
    enableBrotli: z.boolean().default(true),
    level: CompressLevelSchema.default('default'),
    contentTypeUserRule: RegexPattern.default(''),
  })
  .default({});

export const HideFileInDirSchema = z
  .object({
    enable: z.boolean().default(true),
    enableDefaultRules: z.boolean().default(true),
    /** user-agent pattern -> file name pattern; the empty key applies to all clients */
    userRules: z
      .record(RegexPattern)
      .default({})
      .superRefine((rules, ctx) => {
        for (const key of Object.keys(rules)) {
          try {
            new RegExp(key);
          } catch (err) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [key],
              message: `invalid user-agent pattern: ${err instanceof Error ? err.message : String(err)}`,
            });
          }
        }
      }),
  })
  .default({});

export const GatewayConfigSchema = z.object({
  accounts: z.array(AccountSchema).default([]),
  httpDigestAuth: DigestAuthSchema,
  compression: CompressionSchema,
  hideFileInDir: HideFileInDirSchema,
});

export type AccountConfig = z.infer<typeof AccountSchema>;
export type DigestAuthConfig = z.infer<typeof DigestAuthSchema>;
export type CompressLevel = z.infer<typeof CompressLevelSchema>;
export type CompressionConfig = z.infer<typeof CompressionSchema>;
export type HideFileInDirConfig = z.infer<typeof HideFileInDirSchema>;
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
