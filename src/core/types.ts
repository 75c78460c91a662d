import { z } from 'zod';

// ===== Configuration =====

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const StipulateConfigSchema = z.object({
  verification: z.object({
    enabled: z.boolean().default(false),
  }).default({}),
  logging: z.object({
    level: z.enum(LOG_LEVELS).default('warn'),
    pretty: z.boolean().default(false),
  }).default({}),
});

export type StipulateConfig = z.infer<typeof StipulateConfigSchema>;

export type StipulateConfigInput = z.input<typeof StipulateConfigSchema>;

// ===== Events =====

export type ContractKind = 'precondition' | 'postcondition' | 'invariant';

export type CheckPhase = 'before' | 'after';

export interface ContractViolatedEvent {
  kind: ContractKind;
  functionName: string;
  phase?: CheckPhase;
  message: string;
}

export interface VerificationToggledEvent {
  enabled: boolean;
  previous: boolean;
}

export interface StipulateEvents {
  'contract:violated': ContractViolatedEvent;
  'verification:toggled': VerificationToggledEvent;
}
