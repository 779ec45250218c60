import express, { type Request, type Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import type { BridgeClient } from "./client.js";
import type { Role } from "./config.js";
import {
  InvalidRequestError,
  NotFoundError,
  TransactionRejectedError,
  TransportError,
  WaitTimeoutError,
} from "./errors.js";
import type { StatusQuery } from "./status.js";
import type { Store } from "./store.js";
import type { BridgeRequest, RelayJobStatus } from "./types.js";

export interface ApiDeps {
  role: Role;
  status?: StatusQuery;
  client?: BridgeClient;
  journal?: Store;
}

const UINT_REGEX = /^(0|[1-9][0-9]*)$/;

const uintString = z
  .union([z.string(), z.number().int().nonnegative()])
  .transform((v) => String(v))
  .refine((v) => UINT_REGEX.test(v), "expected a non-negative integer")
  .transform((v) => BigInt(v));

const submitSchema = z.object({
  account: z.string().startsWith("0x"),
  key: uintString,
  blockId: uintString,
});

const JOB_STATUSES = new Set<string>(["processing", "served", "failed"]);

function isJobStatus(value: string): value is RelayJobStatus {
  return JOB_STATUSES.has(value);
}

function param(req: Request, name: string): string {
  const raw = req.params[name];
  return Array.isArray(raw) ? raw[0] : raw;
}

function parseRequestId(raw: string): bigint | null {
  return UINT_REGEX.test(raw) ? BigInt(raw) : null;
}

export function requestToJson(request: BridgeRequest) {
  return {
    requestId: request.requestId.toString(),
    account: request.account,
    key: request.key.toString(),
    blockId: request.blockId.toString(),
    submittedAt: request.submittedAt.toISOString(),
    status: request.status,
    reply: request.reply,
  };
}

function sendError(res: Response, route: string, err: unknown): void {
  if (err instanceof InvalidRequestError) {
    res.status(400).json({ error: err.message });
  } else if (err instanceof NotFoundError) {
    res.status(404).json({ error: err.message });
  } else if (err instanceof TransactionRejectedError) {
    res.status(422).json({ error: err.message });
  } else if (err instanceof WaitTimeoutError) {
    res.status(504).json({
      requestId: err.requestId.toString(),
      error: err.message,
    });
  } else if (err instanceof TransportError) {
    console.error(`${route} upstream error:`, err.message);
    res.status(502).json({ error: "Upstream chain unavailable" });
  } else {
    console.error(`${route} error:`, err);
    res.status(500).json({ error: "Internal server error" });
  }
}

export function createApiServer(deps: ApiDeps): express.Express {
  const { role, status, client, journal } = deps;
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.use(
    rateLimit({
      windowMs: 1000,
      limit: 10,
      standardHeaders: "draft-7",
      legacyHeaders: false,
    }),
  );

  if (status) {
    app.get("/stats", async (_req: Request, res: Response) => {
      try {
        const [total, pending, served] = await Promise.all([
          status.getTotal(),
          status.getPending(),
          status.getServed(),
        ]);
        res.status(200).json({
          total: total.toString(),
          pending: pending.toString(),
          served: served.toString(),
        });
      } catch (err) {
        sendError(res, "GET /stats", err);
      }
    });

    app.get("/requests/:requestId", async (req: Request, res: Response) => {
      const requestId = parseRequestId(param(req, "requestId"));
      if (requestId === null) {
        res.status(400).json({ error: "Invalid requestId" });
        return;
      }
      try {
        const request = await status.getRequest(requestId);
        res.status(200).json(requestToJson(request));
      } catch (err) {
        sendError(res, "GET /requests/:requestId", err);
      }
    });
  }

  if (client) {
    app.post("/requests", async (req: Request, res: Response) => {
      const parsed = submitSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: parsed.error.issues[0]?.message ?? "Invalid body" });
        return;
      }

      // Abandon the wait if the caller goes away
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) controller.abort();
      });

      try {
        const result = await client.submitRequest(parsed.data, {
          signal: controller.signal,
        });
        res.status(200).json({
          requestId: result.requestId.toString(),
          reply: result.reply,
        });
      } catch (err) {
        if (controller.signal.aborted) return;
        sendError(res, "POST /requests", err);
      }
    });
  }

  if (journal) {
    app.get("/relay", (req: Request, res: Response) => {
      const raw = typeof req.query.status === "string" ? req.query.status : "failed";
      if (!isJobStatus(raw)) {
        res.status(400).json({ error: "Invalid status" });
        return;
      }
      const requested = Math.trunc(Number(req.query.limit ?? 50)) || 50;
      const limit = Math.max(1, Math.min(requested, 500));
      res.status(200).json({ jobs: journal.getJobsByStatus([raw], limit) });
    });

    app.get("/relay/:requestId", (req: Request, res: Response) => {
      const requestId = parseRequestId(param(req, "requestId"));
      if (requestId === null) {
        res.status(400).json({ error: "Invalid requestId" });
        return;
      }
      const job = journal.getJob(requestId.toString());
      if (!job) {
        res.status(404).json({ error: "Job not found" });
        return;
      }
      res.status(200).json(job);
    });
  }

  app.get("/health", (_req: Request, res: Response) => {
    try {
      res.status(200).json({
        status: "healthy",
        role,
        jobs: journal?.countByStatus() ?? {},
      });
    } catch (err) {
      console.error("GET /health error:", err);
      res.status(500).json({ status: "unhealthy" });
    }
  });

  return app;
}
