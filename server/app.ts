import cors from "cors";
import express, { type ErrorRequestHandler, type Response } from "express";
import { BookError, ConfigurationError, PayloadTooLargeError, ValidationError } from "../services/errors";
import type { JobOrchestrator } from "../services/jobOrchestrator";
import type { StoryCatalog } from "../services/storyCatalog";

export interface AppDeps {
  orchestrator: JobOrchestrator;
  catalog: StoryCatalog;
  apiKeyConfigured: boolean;
  maxUploadMb: number;
}

function sendError(res: Response, e: unknown, label: string): Response {
  if (e instanceof BookError) {
    return res.status(e.statusCode).json({ error: e.message });
  }
  console.error(`[api] ${label} error:`, e);
  return res.status(500).json({ error: "An error occurred processing your request" });
}

function asField(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** Accepts raw base64 or a data: URL. */
function decodeImage(value: string): Buffer {
  return Buffer.from(value.replace(/^data:[^;,]+;base64,/, ""), "base64");
}

export function createApp({ orchestrator, catalog, apiKeyConfigured, maxUploadMb }: AppDeps) {
  const app = express();

  app.use(cors());
  // base64 inflates uploads by a third
  app.use(express.json({ limit: `${Math.ceil(maxUploadMb * 1.4) + 1}mb` }));

  app.post("/upload", async (req, res) => {
    try {
      const body: Record<string, unknown> = typeof req.body === "object" && req.body !== null ? req.body : {};
      const image = asField(body.image);
      if (!image) throw new ValidationError("No image file provided");
      if (!apiKeyConfigured) {
        throw new ConfigurationError("API key not configured. Please set the API_KEY environment variable.");
      }

      const sessionId = await orchestrator.submit({
        image: decodeImage(image),
        filename: asField(body.filename),
        story: asField(body.story_type) ?? "",
        gender: asField(body.gender) ?? "",
        name: asField(body.name),
      });
      return res.json({ session_id: sessionId, message: "Generation started" });
    } catch (e) {
      return sendError(res, e, "Upload");
    }
  });

  app.get("/progress/:sessionId", (req, res) => {
    try {
      return res.json(orchestrator.getStatus(req.params.sessionId));
    } catch (e) {
      return sendError(res, e, "Progress");
    }
  });

  app.get("/download/:sessionId", (req, res) => {
    try {
      const artifact = orchestrator.getArtifact(req.params.sessionId);
      return res.download(artifact.path, artifact.downloadName, (err) => {
        if (err) console.error(`[api] Download of ${req.params.sessionId} failed:`, err);
      });
    } catch (e) {
      return sendError(res, e, "Download");
    }
  });

  app.get("/stories", (_req, res) => {
    res.json({ stories: catalog.list() });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", service: "fairy_tale_generator" });
  });

  const onError: ErrorRequestHandler = (err, _req, res, next) => {
    if (res.headersSent) return next(err);
    if (err instanceof Error && "type" in err && err.type === "entity.too.large") {
      return res.status(413).json({ error: new PayloadTooLargeError(maxUploadMb).message });
    }
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: "Request body is not valid JSON" });
    }
    return sendError(res, err, "Request");
  };
  app.use(onError);

  return app;
}
