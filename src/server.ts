import http from "http";
import { type Checkpoint, toPersistedCheckpoint } from "./core/checkpoint/checkpoint";
import type { MigrationProgress } from "./application/migrate-images/migration.progress";
import type { CheckpointStore } from "./ports/CheckpointStore";

export const readinessMessage = "Image URL migrator is running";

export type StatusServerDeps = {
  checkpoints: CheckpointStore;
  progress: MigrationProgress;
};

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

/**
 * Liveness and status responder. It only reads the checkpoint store and the
 * progress snapshot, so it never waits on the migration worker.
 */
export const createServer = (deps: StatusServerDeps) => {
  const respond = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const { pathname } = new URL(req.url ?? "/", "http://localhost");

    if (req.method !== "GET" && req.method !== "HEAD") {
      sendJson(res, 405, { error: "method_not_allowed" });
      return;
    }

    if (pathname === "/") {
      res.writeHead(200, { "content-type": "text/plain; charset=utf-8" });
      res.end(readinessMessage);
      return;
    }

    if (pathname === "/status") {
      const progress = deps.progress.snapshot();
      let checkpoint: Checkpoint | null;
      try {
        checkpoint = await deps.checkpoints.read();
      } catch {
        sendJson(res, 503, { error: "checkpoint_unavailable", progress });
        return;
      }

      if (checkpoint === null) {
        sendJson(res, 200, { checkpoint: null, message: "no checkpoint yet", progress });
        return;
      }
      sendJson(res, 200, { checkpoint: toPersistedCheckpoint(checkpoint), progress });
      return;
    }

    sendJson(res, 404, { error: "not_found" });
  };

  return http.createServer((req, res) => {
    respond(req, res).catch(() => {
      if (res.headersSent) {
        res.end();
        return;
      }
      sendJson(res, 500, { error: "internal_error" });
    });
  });
};
