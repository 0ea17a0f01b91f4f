import { Router, type Request, type Response } from "express";
import { promises as fs } from "fs";
import type { Redis } from "ioredis";
import { Server } from "socket.io";
import { CONFIG } from "../config/env";
import { formatSize } from "../engine/chunkManager";

export const SERVICE_NAME = "chunkdrop-server";

export interface HealthDependencies {
  uploadDir: string;
  redis?: Redis;
}

// Application start time
const startTime = Date.now();

function basicHealth() {
  return {
    status: "healthy",
    timestamp: new Date().toISOString(),
    uptime: Math.floor((Date.now() - startTime) / 1000),
    service: SERVICE_NAME,
    version: process.env.npm_package_version || "1.0.0",
    environment: CONFIG.NODE_ENV,
  };
}

function unhealthy(res: Response, error: unknown): void {
  console.error("Health check error:", error);
  res.status(503).json({
    status: "unhealthy",
    timestamp: new Date().toISOString(),
    service: SERVICE_NAME,
    error: error instanceof Error ? error.message : "Unknown error",
  });
}

export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();

  // Basic health check
  const healthHandler = (req: Request, res: Response) => {
    try {
      res.status(200).json(basicHealth());
    } catch (error) {
      unhealthy(res, error);
    }
  };
  router.get("/", healthHandler);
  router.head("/", (req, res) => {
    res.sendStatus(200);
  });
  router.get("/health", healthHandler);
  // Health check under the API path (compatibility)
  router.get("/api/health", healthHandler);

  // Detailed health check
  router.get("/health/detailed", async (req: Request, res: Response) => {
    const errors: string[] = [];
    let status = "healthy";

    try {
      const storageHealth = await checkStorageHealth(deps.uploadDir);
      if (storageHealth.status !== "writable") {
        errors.push("Upload directory is not writable");
        status = "unhealthy";
      }

      const redisHealth = deps.redis ? await checkRedisHealth(deps.redis) : undefined;
      if (redisHealth && redisHealth.status !== "connected") {
        errors.push("Redis connection failed");
        status = "unhealthy";
      }

      // Check Socket.IO status
      const io: unknown = req.app.get("io");
      const socketHealth = {
        status: io instanceof Server ? "running" : "not_initialized",
        connections: io instanceof Server ? io.engine.clientsCount : 0,
      };

      const systemInfo = getSystemInfo();
      if (systemInfo.memory.percent > 90) {
        errors.push("High memory usage (>90%)");
        status = status === "healthy" ? "degraded" : status;
      }

      const detailedHealth = {
        ...basicHealth(),
        status,
        dependencies: {
          storage: storageHealth,
          socketio: socketHealth,
          ...(redisHealth && { redis: redisHealth }),
        },
        system: systemInfo,
        ...(errors.length > 0 && { errors }),
      };

      // Only a failed dependency takes the service out of rotation
      res.status(status === "unhealthy" ? 503 : 200).json(detailedHealth);
    } catch (error) {
      unhealthy(res, error);
    }
  });

  return router;
}

async function checkStorageHealth(uploadDir: string) {
  try {
    await fs.mkdir(uploadDir, { recursive: true });
    await fs.access(uploadDir, fs.constants.W_OK);
    return { status: "writable", path: uploadDir };
  } catch (error) {
    return {
      status: "unwritable",
      path: uploadDir,
      error: error instanceof Error ? error.message : "Unknown error",
    };
  }
}

// Redis health check
async function checkRedisHealth(redis: Redis) {
  try {
    const start = Date.now();
    await redis.ping();
    return {
      status: "connected",
      responseTime: Date.now() - start,
      host: CONFIG.REDIS.HOST,
      port: CONFIG.REDIS.PORT,
    };
  } catch (error) {
    return {
      status: "disconnected",
      error: error instanceof Error ? error.message : "Unknown error",
      host: CONFIG.REDIS.HOST,
      port: CONFIG.REDIS.PORT,
    };
  }
}

function getSystemInfo() {
  const memUsage = process.memoryUsage();
  const totalMem = memUsage.heapTotal;
  const usedMem = memUsage.heapUsed;

  return {
    memory: {
      used: formatSize(usedMem),
      free: formatSize(totalMem - usedMem),
      total: formatSize(totalMem),
      percent: Math.round((usedMem / totalMem) * 100),
    },
    uptime: process.uptime(),
    platform: process.platform,
    arch: process.arch,
    nodeVersion: process.version,
  };
}
