import express, { type NextFunction, type Request, type Response } from "express";
import { ContentStore } from "./contentStore.js";

export const INDEX_MESSAGE = "Docker Content Management Demo";
export const WRITE_MESSAGE = "Content written!";
export const LOG_HINT = "Use 'docker logs <container_id>' to view container logs.";

interface WriteBody {
  content?: unknown;
}

interface WriteResult {
  message: string;
}

interface ReadResult {
  content: string;
}

interface LogsResult {
  log_hint: string;
}

export const BODY_LIMIT = "50mb";

// Client-side failures raised by express.json() while reading the body
const BODY_ERROR_TYPES = new Set([
  "charset.unsupported",
  "encoding.unsupported",
  "entity.parse.failed",
  "entity.too.large",
  "entity.verify.failed",
  "parameters.too.many",
  "request.aborted",
  "request.size.invalid",
  "stream.encoding.set",
]);

function isBodyError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    typeof err.type === "string" &&
    BODY_ERROR_TYPES.has(err.type)
  );
}

export function createApp(store: ContentStore): express.Express {
  const app = express();

  app.use(express.json({ limit: BODY_LIMIT }));

  // A body that cannot be read as JSON is treated as an empty one
  app.use((err: unknown, req: Request, _res: Response, next: NextFunction) => {
    if (isBodyError(err)) {
      req.body = {};
      next();
      return;
    }
    next(err);
  });

  app.get("/", (_req: Request, res: Response) => {
    res.type("text/plain").send(INDEX_MESSAGE);
  });

  app.post(
    "/write",
    async (req: Request<{}, WriteResult, WriteBody | undefined>, res: Response<WriteResult>, next: NextFunction) => {
      const content = typeof req.body?.content === "string" ? req.body.content : "";
      try {
        await store.append(content);
        res.json({ message: WRITE_MESSAGE });
      } catch (err) {
        next(err);
      }
    }
  );

  app.get("/read", async (_req: Request, res: Response<ReadResult>, next: NextFunction) => {
    try {
      res.json({ content: await store.read() });
    } catch (err) {
      next(err);
    }
  });

  app.get("/logs", (_req: Request, res: Response<LogsResult>) => {
    res.json({ log_hint: LOG_HINT });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.error(`${req.method} ${req.path} failed:`, err);
    res.status(500).json({ error: "Internal Server Error" });
  });

  return app;
}
