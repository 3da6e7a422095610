/**
 * Options of the writer, validated with zod.
 */

import { z } from "zod";
import { InvalidArgumentError } from "#src/errors";
import { EncryptOptionsSchema } from "#src/security/schemas";

const DecodeLevelSchema = z.enum(["none", "generalized", "specialized", "all"]);

export const WriteOptionsSchema = z
  .object({
    /** Header version; defaults to the document's */
    pdfVersion: z
      .string()
      .regex(/^\d\.\d$/, "must look like 1.7")
      .optional(),
    linearize: z.boolean().default(false),
    /** Fixed /ID so that output is reproducible */
    staticId: z.boolean().default(false),
    streamDataMode: z.enum(["uncompress", "preserve", "compress"]).default("preserve"),
    /** Overrides the default of `streamDataMode` */
    compressStreams: z.boolean().optional(),
    /** Overrides the default of `streamDataMode` */
    decodeLevel: DecodeLevelSchema.optional(),
    objectStreamMode: z.enum(["disable", "preserve", "generate"]).default("preserve"),
    contentNormalization: z.boolean().default(false),
    preserveUnreferencedObjects: z.boolean().default(false),
    encrypt: EncryptOptionsSchema.optional(),
  })
  .strict();

export type WriteOptions = z.input<typeof WriteOptionsSchema>;

type ParsedWriteOptions = z.output<typeof WriteOptionsSchema>;

/**
 * Options with the stream-data defaults filled in.
 */
export interface ResolvedWriteOptions
  extends Omit<ParsedWriteOptions, "compressStreams" | "decodeLevel"> {
  compressStreams: boolean;
  decodeLevel: z.infer<typeof DecodeLevelSchema>;
}

export type StreamDataMode = ParsedWriteOptions["streamDataMode"];
export type ObjectStreamMode = ParsedWriteOptions["objectStreamMode"];

const STREAM_DATA_DEFAULTS: Record<
  StreamDataMode,
  Pick<ResolvedWriteOptions, "compressStreams" | "decodeLevel">
> = {
  uncompress: { compressStreams: false, decodeLevel: "generalized" },
  preserve: { compressStreams: false, decodeLevel: "none" },
  compress: { compressStreams: true, decodeLevel: "generalized" },
};

/**
 * Write options that failed validation. The zod error is the cause.
 */
export class InvalidWriteOptionsError extends InvalidArgumentError {
  readonly issues: z.ZodIssue[];

  constructor(error: z.ZodError) {
    const details = error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");

    super(`Invalid write options: ${details}`, { cause: error });
    this.name = "InvalidWriteOptionsError";
    this.issues = error.issues;
  }
}

/**
 * Validate write options and fill in defaults.
 *
 * @throws {InvalidWriteOptionsError} for unknown keys and bad values
 */
export function resolveWriteOptions(options: WriteOptions = {}): ResolvedWriteOptions {
  const result = WriteOptionsSchema.safeParse(options);

  if (!result.success) {
    throw new InvalidWriteOptionsError(result.error);
  }

  const parsed = result.data;
  const defaults = STREAM_DATA_DEFAULTS[parsed.streamDataMode];

  return {
    ...parsed,
    compressStreams: parsed.compressStreams ?? defaults.compressStreams,
    decodeLevel: parsed.decodeLevel ?? defaults.decodeLevel,
  };
}
