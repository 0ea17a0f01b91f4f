import type { FileManifest, Manifest } from "../types/manifest";
import { InvalidInputError } from "../utils/errors";

/**
 * One file's slice of the global chunk id space.
 * Global ids `offset .. offset + count - 1` belong to this file's local ids `0 .. count - 1`.
 */
export interface FileChunkRange {
  fileIndex: number;
  /** `null` for a single-file manifest */
  relativePath: string | null;
  file: FileManifest;
  offset: number;
  count: number;
}

export interface ChunkLayout {
  totalChunks: number;
  files: FileChunkRange[];
}

export interface ChunkLocation {
  fileIndex: number;
  chunkId: number;
  range: FileChunkRange;
}

/**
 * Flattens a manifest into one contiguous chunk id space, file order preserved.
 * Upload, download, relay status and the LAN client all go through this so the
 * id arithmetic can never drift between the two ends of a transfer.
 */
export function chunkLayout(manifest: Manifest): ChunkLayout {
  if (manifest.kind === "file") {
    return {
      totalChunks: manifest.totalChunks,
      files: [
        {
          fileIndex: 0,
          relativePath: null,
          file: manifest,
          offset: 0,
          count: manifest.totalChunks,
        },
      ],
    };
  }

  let offset = 0;
  const files = manifest.files.map((file, fileIndex) => {
    const range: FileChunkRange = {
      fileIndex,
      relativePath: file.relativePath,
      file,
      offset,
      count: file.totalChunks,
    };
    offset += file.totalChunks;
    return range;
  });
  return { totalChunks: offset, files };
}

export function totalChunksOf(manifest: Manifest): number {
  return chunkLayout(manifest).totalChunks;
}

/** Maps a global chunk id back to its file and local chunk id. */
export function locateChunk(layout: ChunkLayout, globalId: number): ChunkLocation {
  if (!Number.isInteger(globalId) || globalId < 0 || globalId >= layout.totalChunks) {
    throw new InvalidInputError(
      `Chunk ${globalId} is outside 0..${layout.totalChunks - 1}`
    );
  }
  // Last range whose offset is <= globalId. Empty files share their offset
  // with the following file, so the search always lands past them.
  let lo = 0;
  let hi = layout.files.length - 1;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (layout.files[mid].offset <= globalId) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  const range = layout.files[lo];
  return { fileIndex: range.fileIndex, chunkId: globalId - range.offset, range };
}
