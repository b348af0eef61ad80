import express, { type Request } from "express";

export const RAW_BODY_LIMIT = "512kb";

// keep the exact bytes: signatures are computed over them, not over re-serialized JSON
export function rawBodyParser() {
  return express.raw({ type: () => true, limit: RAW_BODY_LIMIT });
}

export function readRawBody(req: Request): Buffer {
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}
