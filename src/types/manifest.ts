import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/**
 * Manifest schemas.
 *
 * A manifest is the immutable description of one transfer: either a single
 * file or a folder of files. The two variants are told apart by `kind`.
 * Chunk and file digests are lowercase sha256 hex.
 */

const Sha256Hex = Type.String({ pattern: "^[0-9a-f]{64}$" });
const NonNegativeInt = Type.Integer({ minimum: 0 });

export const TransferModeSchema = Type.Union([
  Type.Literal("lan"),
  Type.Literal("webrtc"),
  Type.Literal("relay"),
]);

export const ChunkInfoSchema = Type.Object({
  id: NonNegativeInt,
  hash: Sha256Hex,
  size: NonNegativeInt,
});

const fileFields = {
  fileName: Type.String({ minLength: 1 }),
  filePath: Type.String(),
  size: NonNegativeInt,
  chunkSize: Type.Integer({ minimum: 1 }),
  totalChunks: NonNegativeInt,
  hash: Sha256Hex,
  mode: TransferModeSchema,
  chunks: Type.Array(ChunkInfoSchema),
};

export const FileManifestSchema = Type.Object({
  kind: Type.Literal("file"),
  ...fileFields,
});

export const FolderFileManifestSchema = Type.Object({
  kind: Type.Literal("file"),
  ...fileFields,
  relativePath: Type.String({ minLength: 1 }),
});

export const FolderManifestSchema = Type.Object({
  kind: Type.Literal("folder"),
  folderName: Type.String({ minLength: 1 }),
  folderPath: Type.String(),
  totalSize: NonNegativeInt,
  totalFiles: NonNegativeInt,
  chunkSize: Type.Integer({ minimum: 1 }),
  mode: TransferModeSchema,
  files: Type.Array(FolderFileManifestSchema),
});

export const ManifestSchema = Type.Union([
  FileManifestSchema,
  FolderManifestSchema,
]);

export type ChunkInfo = Static<typeof ChunkInfoSchema>;
export type FileManifest = Static<typeof FileManifestSchema>;
export type FolderFileManifest = Static<typeof FolderFileManifestSchema>;
export type FolderManifest = Static<typeof FolderManifestSchema>;
export type Manifest = Static<typeof ManifestSchema>;

export interface ManifestProblem {
  path: string;
  message: string;
}

function structuralProblems(value: unknown): ManifestProblem[] {
  return [...Value.Errors(ManifestSchema, value)]
    .slice(0, 10)
    .map((e) => ({ path: e.path || "/", message: e.message }));
}

// Checks the schema cannot express: chunk coverage and per-file arithmetic.
function fileProblems(file: FileManifest, at: string): ManifestProblem[] {
  const problems: ManifestProblem[] = [];
  const expectedTotal = Math.ceil(file.size / file.chunkSize);
  if (file.totalChunks !== expectedTotal) {
    problems.push({
      path: `${at}/totalChunks`,
      message: `expected ${expectedTotal} for size ${file.size}`,
    });
  }
  if (file.chunks.length !== file.totalChunks) {
    problems.push({
      path: `${at}/chunks`,
      message: `expected ${file.totalChunks} entries, got ${file.chunks.length}`,
    });
  }
  file.chunks.forEach((chunk, index) => {
    if (chunk.id !== index) {
      problems.push({
        path: `${at}/chunks/${index}/id`,
        message: `expected contiguous id ${index}`,
      });
    }
  });
  return problems;
}

/**
 * Returns every problem found in `value`, or an empty list for a well-formed
 * manifest. Structural problems short-circuit the semantic checks.
 */
export function manifestProblems(value: unknown): ManifestProblem[] {
  const structural = structuralProblems(value);
  if (structural.length > 0 || !Value.Check(ManifestSchema, value)) {
    return structural;
  }
  if (value.kind === "file") return fileProblems(value, "");

  const problems: ManifestProblem[] = [];
  const seen = new Set<string>();
  value.files.forEach((file, index) => {
    if (seen.has(file.relativePath)) {
      problems.push({
        path: `/files/${index}/relativePath`,
        message: `duplicate path ${file.relativePath}`,
      });
    }
    seen.add(file.relativePath);
    if (file.chunkSize !== value.chunkSize) {
      problems.push({
        path: `/files/${index}/chunkSize`,
        message: "must match the folder chunk size",
      });
    }
    problems.push(...fileProblems(file, `/files/${index}`));
  });
  const totalSize = value.files.reduce((sum, file) => sum + file.size, 0);
  if (value.totalSize !== totalSize) {
    problems.push({ path: "/totalSize", message: `expected ${totalSize}` });
  }
  if (value.totalFiles !== value.files.length) {
    problems.push({
      path: "/totalFiles",
      message: `expected ${value.files.length}`,
    });
  }
  return problems;
}

export function isManifest(value: unknown): value is Manifest {
  return manifestProblems(value).length === 0;
}
