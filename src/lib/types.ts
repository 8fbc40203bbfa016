import { z } from "zod";

// Free-form sidecar values: kept as written when they are strings or numbers
const MetadataScalarSchema = z.union([z.string(), z.number()]);

// Every sidecar field is optional and falls back to undefined on a wrong type,
// so one bad field never discards the rest of the file.
const GameMetadataSchema = z.object({
  title: z.string().optional().catch(undefined),
  cover: z.string().optional().catch(undefined),
  video: z.string().optional().catch(undefined),
  year: MetadataScalarSchema.optional().catch(undefined),
  publisher: MetadataScalarSchema.optional().catch(undefined),
  region: MetadataScalarSchema.optional().catch(undefined),
  notes: MetadataScalarSchema.optional().catch(undefined),
  tags: z
    .array(MetadataScalarSchema)
    .transform((tags) => tags.map((tag) => String(tag)))
    .optional()
    .catch(undefined),
});

const GameSchema = z.object({
  title: z.string(),
  year: MetadataScalarSchema.nullable(),
  publisher: MetadataScalarSchema.nullable(),
  region: MetadataScalarSchema.nullable(),
  tags: z.array(z.string()),
  notes: MetadataScalarSchema.nullable(),
  cover: z.string().nullable(), // relative to the output root
  video: z.string().nullable(), // relative to the output root
  source: z.string(), // relative to the library root
});

const GameConsoleSchema = z.object({
  name: z.string(),
  slug: z.string(),
  games: z.array(GameSchema),
});

const LibrarySchema = z.object({
  generated_at: z.string(),
  consoles: z.array(GameConsoleSchema),
});

// Sidecar written by the importer when a game folder has none
const ImportedSidecarSchema = z.object({
  title: z.string(),
  cover: z.string().optional(),
  video: z.string().optional(),
});

export type MetadataScalar = z.infer<typeof MetadataScalarSchema>;
export type GameMetadata = z.infer<typeof GameMetadataSchema>;
export type Game = z.infer<typeof GameSchema>;
export type GameConsole = z.infer<typeof GameConsoleSchema>;
export type Library = z.infer<typeof LibrarySchema>;
export type ImportedSidecar = z.infer<typeof ImportedSidecarSchema>;

export {
  MetadataScalarSchema,
  GameMetadataSchema,
  GameSchema,
  GameConsoleSchema,
  LibrarySchema,
  ImportedSidecarSchema,
};
