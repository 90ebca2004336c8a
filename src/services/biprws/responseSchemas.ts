import { z } from "zod";
import { ParseError } from "./errors.js";

// Raylight and Infostore return numeric ids; they are only ever used in URLs.
const idSchema = z.union([z.string(), z.number()]).transform(String);

export const logonResponseSchema = z.object({
  logonToken: z.string().min(1),
});

export const documentResponseSchema = z.object({
  document: z.object({
    id: idSchema.optional(),
    path: z.string(),
    name: z.string(),
  }),
});

const dataProviderSchema = z.object({
  id: idSchema,
  name: z.string(),
});

/**
 * A report with a single data provider comes back as an object rather than
 * a one-element array.
 */
export const dataProvidersResponseSchema = z.object({
  dataproviders: z
    .object({
      dataprovider: z
        .union([dataProviderSchema, z.array(dataProviderSchema)])
        .optional(),
    })
    .optional(),
});

const folderEntrySchema = z.object({
  id: idSchema,
  type: z.string(),
  name: z.string().optional(),
});

export const folderChildrenResponseSchema = z.object({
  entries: z.array(folderEntrySchema).optional(),
});

/**
 * Check the fields a caller reads from a response body.
 * Throws ParseError naming the first missing or mistyped fields.
 */
export function readResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  description: string,
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ParseError(`Unexpected ${description} response: ${issues}`);
  }
  return result.data;
}
