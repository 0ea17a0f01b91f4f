/**
 * Relay HTTP API
 *
 *   POST   /transfer/create                      { transfer_id, manifest }
 *   POST   /transfer/:transferId/chunk/:chunkId  application/octet-stream body
 *   GET    /transfer/:transferId/chunk/:chunkId  chunk bytes
 *   GET    /transfer/:transferId/manifest
 *   GET    /transfer/:transferId/status
 *   DELETE /transfer/:transferId
 *   POST   /cleanup  (GET kept for uptime pingers)
 */
import express, { Router, type RequestHandler } from "express";
import { chunkFileName, type RelayStore } from "../services/relayStore";
import { InvalidInputError } from "../utils/errors";

interface CreateTransferRequest {
  transfer_id?: unknown;
  manifest?: unknown;
}

type TransferParams = { transferId: string };
type ChunkParams = { transferId: string; chunkId: string };

export interface RelayRouterOptions {
  /** Largest accepted chunk body in bytes */
  maxChunkBytes: number;
}

function parseChunkId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new InvalidInputError(`Invalid chunk id: ${raw}`);
  }
  return parseInt(raw, 10);
}

// Older clients send the manifest as a JSON string
function parseManifestField(value: unknown): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    throw new InvalidInputError("manifest is not valid JSON");
  }
}

export function createRelayRouter(
  store: RelayStore,
  options: RelayRouterOptions
): Router {
  const router = Router();

  // Route handler for creating a transfer
  const createTransferHandler: RequestHandler<{}, unknown, CreateTransferRequest> = async (
    req,
    res,
    next
  ) => {
    try {
      const { transfer_id: transferId, manifest } = req.body ?? {};
      if (typeof transferId !== "string" || transferId.length === 0) {
        throw new InvalidInputError("transfer_id is required");
      }
      const result = await store.create(transferId, parseManifestField(manifest));
      console.log(
        `[relay] Created transfer ${transferId} with ${result.total_chunks} chunks`
      );
      res.json(result);
    } catch (error) {
      next(error);
    }
  };

  // Route handler for uploading one chunk
  const uploadChunkHandler: RequestHandler<ChunkParams> = async (req, res, next) => {
    try {
      const chunkId = parseChunkId(req.params.chunkId);
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        throw new InvalidInputError("Chunk body is required");
      }
      res.json(await store.putChunk(req.params.transferId, chunkId, body));
    } catch (error) {
      next(error);
    }
  };

  // Route handler for downloading one chunk
  const downloadChunkHandler: RequestHandler<ChunkParams> = async (req, res, next) => {
    try {
      const chunkId = parseChunkId(req.params.chunkId);
      const data = await store.getChunk(req.params.transferId, chunkId);
      res
        .status(200)
        .type("application/octet-stream")
        .set("Content-Disposition", `attachment; filename="${chunkFileName(chunkId)}"`)
        .send(data);
    } catch (error) {
      next(error);
    }
  };

  const manifestHandler: RequestHandler<TransferParams> = async (req, res, next) => {
    try {
      res.json(await store.getManifest(req.params.transferId));
    } catch (error) {
      next(error);
    }
  };

  const statusHandler: RequestHandler<TransferParams> = async (req, res, next) => {
    try {
      res.json(await store.status(req.params.transferId));
    } catch (error) {
      next(error);
    }
  };

  const deleteHandler: RequestHandler<TransferParams> = async (req, res, next) => {
    try {
      await store.delete(req.params.transferId);
      console.log(`[relay] Deleted transfer ${req.params.transferId}`);
      res.json({ status: "deleted", transfer_id: req.params.transferId });
    } catch (error) {
      next(error);
    }
  };

  const cleanupHandler: RequestHandler = async (req, res, next) => {
    try {
      const deleted = await store.sweep();
      res.json({
        status: "cleaned",
        deleted_count: deleted.length,
        deleted_transfers: deleted,
      });
    } catch (error) {
      next(error);
    }
  };

  // Register routes
  router.post("/transfer/create", express.json({ limit: "50mb" }), createTransferHandler);
  router.post(
    "/transfer/:transferId/chunk/:chunkId",
    express.raw({ type: () => true, limit: options.maxChunkBytes }),
    uploadChunkHandler
  );
  router.get("/transfer/:transferId/chunk/:chunkId", downloadChunkHandler);
  router.get("/transfer/:transferId/manifest", manifestHandler);
  router.get("/transfer/:transferId/status", statusHandler);
  router.delete("/transfer/:transferId", deleteHandler);
  router.post("/cleanup", cleanupHandler);
  router.get("/cleanup", cleanupHandler);

  return router;
}
