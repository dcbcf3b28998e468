import { readFile } from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { formatZodError } from "../config/loadConfig.js";
import { isDirectory, pathExists } from "../utils/fs.js";
import { ModelRecordError } from "../utils/errors.js";

export const METADATA_FILE = "metadata.yaml";

export interface ModelIdentity {
  folder: string;
  createdAt: string | null;
  periodStart: string | null;
  periodEnd: string | null;
}

// Tuples such as the data shape are written with the `!!python/tuple` tag.
const PythonTupleType = new yaml.Type("tag:yaml.org,2002:python/tuple", {
  kind: "sequence",
  construct: (data: unknown) => data
});

const METADATA_SCHEMA = yaml.DEFAULT_SCHEMA.extend([PythonTupleType]);

// Unquoted ISO timestamps load as Date objects; keep them as strings.
const DateLikeSchema = z.union([
  z.string(),
  z.date().transform((value) => value.toISOString()),
  z.number().transform((value) => String(value))
]);

export const ModelMetadataSchema = z
  .object({
    created_at: DateLikeSchema.optional(),
    date_range: z
      .object({
        start: DateLikeSchema.optional(),
        end: DateLikeSchema.optional()
      })
      .passthrough()
      .optional(),
    data_shape: z.array(z.number().int().nonnegative()).optional()
  })
  .passthrough();

export type ModelMetadata = z.infer<typeof ModelMetadataSchema>;

export interface ModelRecord {
  path: string;
  identity: ModelIdentity;
  metadata: ModelMetadata;
  reportText: string;
}

export interface LoadModelRecordOptions {
  sourceFile: string;
}

export function parseModelMetadata(raw: string, folder: string): ModelMetadata {
  let loaded: unknown;
  try {
    loaded = yaml.load(raw, { schema: METADATA_SCHEMA });
  } catch (error) {
    throw new ModelRecordError(`Invalid YAML in ${METADATA_FILE} for model ${folder}`, {
      cause: error
    });
  }

  const result = ModelMetadataSchema.safeParse(loaded ?? {});
  if (!result.success) {
    throw new ModelRecordError(
      `Invalid ${METADATA_FILE} for model ${folder}: ${formatZodError(result.error)}`
    );
  }
  return result.data;
}

export function identityFromMetadata(folder: string, metadata: ModelMetadata): ModelIdentity {
  return {
    folder,
    createdAt: metadata.created_at ?? folder,
    periodStart: metadata.date_range?.start ?? null,
    periodEnd: metadata.date_range?.end ?? null
  };
}

/**
 * Reads a stored model's folder: its generated report (required) and its
 * metadata file (optional, the folder name stands in for the creation date).
 */
export async function loadModelRecord(
  modelDir: string,
  options: LoadModelRecordOptions
): Promise<ModelRecord> {
  const resolved = path.resolve(modelDir);
  const folder = path.basename(resolved);

  if (!(await isDirectory(resolved))) {
    throw new ModelRecordError(`Model folder not found: ${resolved}`);
  }

  const reportPath = path.join(resolved, options.sourceFile);
  let reportText: string;
  try {
    reportText = await readFile(reportPath, "utf8");
  } catch (error) {
    throw new ModelRecordError(`Unable to read report ${options.sourceFile} for model ${folder}`, {
      cause: error
    });
  }

  const metadataPath = path.join(resolved, METADATA_FILE);
  let metadata: ModelMetadata = { created_at: folder };
  if (await pathExists(metadataPath)) {
    let raw: string;
    try {
      raw = await readFile(metadataPath, "utf8");
    } catch (error) {
      throw new ModelRecordError(`Unable to read ${METADATA_FILE} for model ${folder}`, {
        cause: error
      });
    }
    metadata = parseModelMetadata(raw, folder);
  }

  return {
    path: resolved,
    identity: identityFromMetadata(folder, metadata),
    metadata,
    reportText
  };
}
