import { z } from "zod";
import { InvalidSettingsError } from "./errors";

const bufferSize = z.number().int().positive();

export const materializerSettingsSchema = z
  .object({
    /** Elements a stage may request ahead of use */
    initialInputBufferSize: bufferSize.default(4),
    maximumInputBufferSize: bufferSize.default(16),
    /** Default buffer bounds for toFanoutPublisher */
    initialFanOutBufferSize: bufferSize.default(4),
    maximumFanOutBufferSize: bufferSize.default(16),
    /** Messages a stage handles per scheduled turn before yielding */
    throughput: z.number().int().positive().default(32),
    scheduler: z.enum(["immediate", "microtask"]).default("immediate"),
  })
  .refine((s) => s.initialInputBufferSize <= s.maximumInputBufferSize, {
    message: "initialInputBufferSize must not exceed maximumInputBufferSize",
    path: ["initialInputBufferSize"],
  })
  .refine((s) => s.initialFanOutBufferSize <= s.maximumFanOutBufferSize, {
    message: "initialFanOutBufferSize must not exceed maximumFanOutBufferSize",
    path: ["initialFanOutBufferSize"],
  });

export type MaterializerSettings = z.infer<typeof materializerSettingsSchema>;
export type MaterializerSettingsInput = z.input<typeof materializerSettingsSchema>;

export function parseMaterializerSettings(input: MaterializerSettingsInput = {}): MaterializerSettings {
  const parsed = materializerSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSettingsError(`Invalid materializer settings: ${formatIssues(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}

const fanoutBoundsSchema = z
  .object({ initialBufferSize: bufferSize, maximumBufferSize: bufferSize })
  .refine((b) => b.initialBufferSize <= b.maximumBufferSize, {
    message: "initialBufferSize must not exceed maximumBufferSize",
    path: ["initialBufferSize"],
  });

export type FanoutBounds = z.infer<typeof fanoutBoundsSchema>;

export function parseFanoutBounds(initialBufferSize: number, maximumBufferSize: number): FanoutBounds {
  const parsed = fanoutBoundsSchema.safeParse({ initialBufferSize, maximumBufferSize });
  if (!parsed.success) {
    throw new InvalidSettingsError(`Invalid fan-out buffer sizes: ${formatIssues(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}
