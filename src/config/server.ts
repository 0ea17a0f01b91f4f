import type { CorsOptions } from "cors";
import { CONFIG } from "./env";

// Define the sources allowed in the development environment
const DEV_ORIGINS: (string | RegExp)[] = [
  "http://localhost:3002",
  /^http:\/\/localhost:\d+$/, // any local port
  /^http:\/\/192\.168\.\d+\.\d+:\d+$/, // LAN addresses
];
if (CONFIG.CORS_ORIGIN) DEV_ORIGINS.unshift(CONFIG.CORS_ORIGIN);

// Parse a comma-separated origin list for production
const parseProdOrigins = (): string | RegExp | (string | RegExp)[] => {
  const v = CONFIG.CORS_ORIGIN.trim();
  if (!v) return DEV_ORIGINS; // fall back to the development allow-list
  if (v.includes(",")) {
    return v
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
  }
  return v;
};

const ALLOWED_METHODS = ["GET", "HEAD", "POST", "DELETE", "OPTIONS"];

// Configure CORS
export const corsOptions: CorsOptions =
  CONFIG.NODE_ENV === "production"
    ? {
        origin: parseProdOrigins(),
        methods: ALLOWED_METHODS,
        credentials: true,
        allowedHeaders: ["Content-Type", "Authorization"],
      }
    : {
        origin: DEV_ORIGINS,
        credentials: true,
        methods: ALLOWED_METHODS,
        allowedHeaders: ["Content-Type", "Authorization"],
      };

// Configure CORS for Socket.IO
export const corsWSOptions = {
  origin:
    CONFIG.NODE_ENV === "production" ? parseProdOrigins() : DEV_ORIGINS,
  methods: ["GET", "POST"],
  credentials: true,
};
