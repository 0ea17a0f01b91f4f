import express, { Router, type RequestHandler } from "express";
import type { SignalingHub } from "../services/signalingHub";
import { InvalidInputError } from "../utils/errors";

// Define interfaces to improve code readability and type safety
interface CreatePairRequest {
  transfer_id?: unknown;
  manifest?: unknown;
}

export function createSignalingRouter(hub: SignalingHub): Router {
  const router = Router();

  // Route handler for issuing a pairing code
  const createPairHandler: RequestHandler<{}, unknown, CreatePairRequest> = async (
    req,
    res,
    next
  ) => {
    try {
      const { transfer_id: transferId, manifest } = req.body ?? {};
      let parsed: unknown = manifest;
      if (typeof manifest === "string") {
        try {
          parsed = JSON.parse(manifest);
        } catch {
          throw new InvalidInputError("manifest is not valid JSON");
        }
      }
      res.json(await hub.issuePairCode(transferId, parsed));
    } catch (error) {
      next(error);
    }
  };

  // Route handler for resolving a pairing code
  const pairInfoHandler: RequestHandler<{ code: string }> = async (req, res, next) => {
    try {
      res.json(await hub.getInfo(req.params.code));
    } catch (error) {
      next(error);
    }
  };

  const statsHandler: RequestHandler = async (req, res, next) => {
    try {
      res.json(await hub.stats());
    } catch (error) {
      next(error);
    }
  };

  // Register routes
  router.post("/pair/create", express.json({ limit: "50mb" }), createPairHandler);
  router.get("/pair/:code/info", pairInfoHandler);
  router.get("/stats", statsHandler);

  return router;
}
