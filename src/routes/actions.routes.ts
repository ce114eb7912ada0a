// (SERVER) src/routes/actions.routes.ts
import express from "express";
import type { Response } from "express";
import type { ActionStore } from "../actions/actions.store.js";
import { NotFoundError, ValidationError } from "../actions/actions.errors.js";

// ---------- helpers ----------

// "12" -> 12, anything else -> null (treated as an unknown action)
export function parseActionId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

function notFound(res: Response) {
  return res.status(404).json({ error: "Action not found" });
}

function sendError(res: Response, err: unknown, context: string) {
  if (err instanceof ValidationError) {
    return res.status(400).json({ error: "Invalid request data", details: err.fields });
  }
  if (err instanceof NotFoundError) return notFound(res);

  // StorageError and anything unexpected: detail stays in the log
  console.error(`${context} error:`, err);
  return res.status(500).json({ error: "Internal server error" });
}

// ---------- routes ----------

export function createActionsRouter(store: ActionStore) {
  const router = express.Router();

  // GET /api/actions
  router.get("/", async (_req, res) => {
    try {
      return res.json(await store.list());
    } catch (err) {
      return sendError(res, err, "actions list");
    }
  });

  // POST /api/actions
  router.post("/", async (req, res) => {
    try {
      const created = await store.create(req.body);
      return res.status(201).json(created);
    } catch (err) {
      return sendError(res, err, "actions create");
    }
  });

  // GET /api/actions/:id
  router.get("/:id", async (req, res) => {
    const id = parseActionId(req.params.id);
    if (id === null) return notFound(res);

    try {
      return res.json(await store.get(id));
    } catch (err) {
      return sendError(res, err, "actions get");
    }
  });

  // PUT /api/actions/:id  (full replace)
  router.put("/:id", async (req, res) => {
    const id = parseActionId(req.params.id);
    if (id === null) return notFound(res);

    try {
      return res.json(await store.update(id, req.body, false));
    } catch (err) {
      return sendError(res, err, "actions replace");
    }
  });

  // PATCH /api/actions/:id  (merge supplied fields)
  router.patch("/:id", async (req, res) => {
    const id = parseActionId(req.params.id);
    if (id === null) return notFound(res);

    try {
      return res.json(await store.update(id, req.body, true));
    } catch (err) {
      return sendError(res, err, "actions patch");
    }
  });

  // DELETE /api/actions/:id
  router.delete("/:id", async (req, res) => {
    const id = parseActionId(req.params.id);
    if (id === null) return notFound(res);

    try {
      await store.delete(id);
      return res.status(204).end();
    } catch (err) {
      return sendError(res, err, "actions delete");
    }
  });

  return router;
}
