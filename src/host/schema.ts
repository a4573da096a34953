import { z } from "zod";

export const SETUP_ERRORS = [
  "NONE",
  "NOT_FOUND",
  "CONNECTION_REFUSED",
  "AUTHORIZATION_ERROR",
  "TIMEOUT",
  "OTHER",
] as const;

export type SetupError = (typeof SETUP_ERRORS)[number];

const StringValuesSchema = z.record(z.string(), z.string()).default({});

/**
 * Setup wizard messages sent by the host
 */
export const SetupMessageSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("driver_setup_request"),
    reconfigure: z.boolean().default(false),
    setupData: StringValuesSchema,
  }),
  z.object({
    kind: z.literal("user_data_response"),
    inputValues: StringValuesSchema,
  }),
  z.object({
    kind: z.literal("user_confirmation_response"),
    confirm: z.boolean(),
  }),
  z.object({
    kind: z.literal("abort"),
    error: z.enum(SETUP_ERRORS).default("OTHER"),
  }),
]);

export type SetupMessage = z.infer<typeof SetupMessageSchema>;

export type SetupAction =
  | { kind: "complete" }
  | { kind: "error"; error: SetupError };

export const CommandRequestSchema = z.object({
  command: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional(),
});

export const SubscribeRequestSchema = z.object({
  entityIds: z.array(z.string()).default([]),
});
