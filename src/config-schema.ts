import { z } from "zod";
import { ConfigurationError } from "./errors.js";
export { z };

const IntervalSchema = z.number().int().min(0);

export const StreamConfigSchema = z
  .object({
    // Prefer clientId/clientSecret. appKey/appSecret are the legacy console names.
    clientId: z.string().optional(),
    clientSecret: z.string().optional(),
    appKey: z.string().optional(), // legacy
    appSecret: z.string().optional(), // legacy
    clientJsonFile: z.string().optional(), // JSON file with clientId/clientSecret
    userAgent: z.string().optional(),
    heartbeatIntervalMs: IntervalSchema.optional().default(8_000), // 0 disables heartbeat
    reconnectIntervalMs: IntervalSchema.optional().default(3_000), // 0 disables reconnect
    debug: z.boolean().optional().default(false),
    tokenUrl: z.string().url().optional(),
    gatewayUrl: z.string().url().optional(),
    openApiUrl: z.string().url().optional(),
    // extra CALLBACK topics advertised at negotiation
    topics: z.array(z.string().min(1)).optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.clientId && value.appKey && value.clientId !== value.appKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["appKey"],
        message: "clientId and legacy appKey are both set and differ",
      });
    }
  });

export type StreamConfigInput = z.input<typeof StreamConfigSchema>;

export function parseStreamConfig(input: unknown): z.output<typeof StreamConfigSchema> {
  const parsed = StreamConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`invalid stream config: ${issues}`, { cause: parsed.error });
  }
  return parsed.data;
}
