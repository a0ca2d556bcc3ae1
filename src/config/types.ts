/**
 * Slack Relay — Configuration Types & Schema
 */

import { z } from 'zod';

// ============================================================================
// ZOD SCHEMA
// ============================================================================

export const DirectMessagePolicySchema = z.object({
  enabled: z.boolean().default(true),
  mode: z.enum(['open', 'allowlist']).default('open'),
  allowFrom: z.array(z.string().min(1)).default([]),
});

export const GroupPolicySchema = z.object({
  mode: z.enum(['open', 'mention', 'allowlist']).default('mention'),
  allowFrom: z.array(z.string().min(1)).default([]),
});

export const ReactionConfigSchema = z.object({
  enabled: z.boolean().default(true),
  name: z.string().min(1).default('eyes'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const SlackConfigSchema = z.object({
  botToken: z.string().min(1).optional(),
  botUserId: z.string().min(1).optional(),
  directMessage: DirectMessagePolicySchema.default({}),
  group: GroupPolicySchema.default({}),
  reaction: ReactionConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// ============================================================================
// INFERRED TYPES
// ============================================================================

export type SlackConfig = z.infer<typeof SlackConfigSchema>;
export type DirectMessagePolicyConfig = z.infer<typeof DirectMessagePolicySchema>;
export type GroupPolicyConfig = z.infer<typeof GroupPolicySchema>;
export type ReactionConfig = z.infer<typeof ReactionConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
