/**
 * Zod schemas for encryption dictionary values and encryption options.
 */

import { z } from "zod";

/**
 * /V. Versions 1 to 4 are handled; 5 (AES-256) is recognized only to be
 * rejected with a precise error.
 */
export const VersionSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);
export type Version = z.infer<typeof VersionSchema>;

/**
 * /R. Revisions 5 and 6 are recognized and rejected.
 */
export const RevisionSchema = z.union([
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
]);
export type Revision = z.infer<typeof RevisionSchema>;

/**
 * /CFM of a crypt filter.
 */
export const CryptFilterMethodSchema = z.enum(["None", "V2", "AESV2", "AESV3"]);
export type CryptFilterMethod = z.infer<typeof CryptFilterMethodSchema>;

/** Cipher applied to strings or streams once the file key is known */
export type EncryptionAlgorithm = "RC4" | "AES-128" | "Identity";

/**
 * Encryption requested when writing.
 */
export const EncryptOptionsSchema = z
  .object({
    userPassword: z.string(),
    /** Defaults to the user password */
    ownerPassword: z.string().optional(),
    algorithm: z.enum(["RC4-40", "RC4-128", "AES-128"]),
    permissions: z
      .object({
        print: z.boolean(),
        printHighQuality: z.boolean(),
        modify: z.boolean(),
        copy: z.boolean(),
        annotate: z.boolean(),
        fillForms: z.boolean(),
        accessibility: z.boolean(),
        assemble: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
    encryptMetadata: z.boolean().default(true),
  })
  .strict();
export type EncryptOptions = z.input<typeof EncryptOptionsSchema>;
export type ResolvedEncryptOptions = z.output<typeof EncryptOptionsSchema>;
export type WriteEncryptionAlgorithm = ResolvedEncryptOptions["algorithm"];
