import express from "express";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { z } from "zod";
import { getVersion } from "./config";
import type { ModelFallbackOrchestrator } from "./llm/orchestrator";
import { analyzeCode, answerChat } from "./llm/tasks";
import { ReportFieldsSchema, renderReportPdf, reportFilename } from "./report/pdf";
import type { AssessmentStore } from "./types";
import { errorMessage, safeLog } from "./utils/redact";

export type AppDeps = {
  orchestrator: ModelFallbackOrchestrator;
  store: AssessmentStore;
};

type Body = Record<string, unknown>;

const BodySchema = z.record(z.unknown());

function readBody(req: Request): Body {
  const parsed = BodySchema.safeParse(req.body);
  return parsed.success ? parsed.data : {};
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 600 ? err.status : 500;
  }
  return 500;
}

function str(body: Body, key: string): string {
  const value = body[key];
  return typeof value === "string" ? value : "";
}

function readId(value: unknown): number | undefined {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof n === "number" && Number.isInteger(n) && n > 0 ? n : undefined;
}

function readFlag(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (value === 1 || value === "1" || value === "true") return true;
  if (value === 0 || value === "0" || value === "false") return false;
  return undefined;
}

function badRequest(res: Response, message: string): void {
  res.status(400).json({ status: "error", message });
}

function busy(res: Response, lastError: string): void {
  res.status(503).json({ status: "error", message: `All models are busy. Last error: ${lastError}` });
}

function route(handler: (req: Request, res: Response) => Promise<void> | void): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

export function createApp({ orchestrator, store }: AppDeps) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  // permissive CORS for running the page from another port during development
  app.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
      return;
    }
    next();
  });

  app.get("/api/models", (_req, res) => {
    res.json({ roster: orchestrator.getRoster() });
  });

  app.post(
    "/process_code",
    route(async (req, res) => {
      const body = readBody(req);
      const code = str(body, "code");
      const targetLang = str(body, "target_lang").trim();
      const candidateId = str(body, "candidate_id").trim() || undefined;

      if (!code.trim() || !targetLang) {
        badRequest(res, "code and target_lang are required");
        return;
      }

      safeLog("[/process_code] request", { candidateId, targetLang, codeLength: code.length });
      const result = await analyzeCode(orchestrator, { code, targetLang });

      if (!result.ok) {
        safeLog("[/process_code] all_models_failed", { candidateId, attempts: result.attempts });
        busy(res, result.lastError);
        return;
      }

      safeLog("[/process_code] response", { candidateId, model: result.model, attempts: result.attempts.length });
      res.json({ status: "success", model_used: result.model, candidate_id: candidateId ?? "N/A", ...result.payload });
    })
  );

  app.post(
    "/ai_chat",
    route(async (req, res) => {
      const body = readBody(req);
      const message = str(body, "message").trim();
      const codeContext = str(body, "code_context");

      if (!message) {
        badRequest(res, "message is required");
        return;
      }

      const result = await answerChat(orchestrator, store, { message, codeContext });
      if (!result.ok) {
        busy(res, result.lastError);
        return;
      }
      res.json({ status: "success", reply: result.payload });
    })
  );

  app.post(
    "/save-code",
    route((req, res) => {
      const body = readBody(req);
      const code = str(body, "code");
      const language = str(body, "language").trim();
      if (!code.trim()) {
        badRequest(res, "code is required");
        return;
      }
      const id = store.insertCodeSnapshot(code, language);
      res.json({ status: "success", id });
    })
  );

  app.get(
    "/load-last-code",
    route((_req, res) => {
      const snapshot = store.latestSnapshot();
      res.json({
        status: "success",
        data: snapshot ? { code: snapshot.code, language: snapshot.language } : null
      });
    })
  );

  app.post(
    "/save-project",
    route((req, res) => {
      const body = readBody(req);
      const name = str(body, "projectName").trim();
      const code = str(body, "code");
      const language = str(body, "language").trim();
      if (!name) {
        badRequest(res, "projectName is required");
        return;
      }
      const id = store.insertProject(name, code, language);
      res.json({ status: "success", id });
    })
  );

  app.get(
    "/projects",
    route((_req, res) => {
      res.json({ status: "success", projects: store.listProjects() });
    })
  );

  app.post(
    "/favorite-project",
    route((req, res) => {
      const body = readBody(req);
      const id = readId(body.id);
      const fav = readFlag(body.fav);
      if (id === undefined || fav === undefined) {
        badRequest(res, "id and fav are required");
        return;
      }
      if (!store.setFavorite(id, fav)) {
        res.status(404).json({ status: "error", message: `Project ${id} not found` });
        return;
      }
      res.json({ status: "success" });
    })
  );

  app.post(
    "/delete-project",
    route((req, res) => {
      const id = readId(readBody(req).id);
      if (id === undefined) {
        badRequest(res, "id is required");
        return;
      }
      if (!store.deleteProject(id)) {
        res.status(404).json({ status: "error", message: `Project ${id} not found` });
        return;
      }
      res.json({ status: "success" });
    })
  );

  app.get(
    "/load-chat",
    route((_req, res) => {
      res.json({ status: "success", chat: store.listChat() });
    })
  );

  app.post(
    "/generate_pdf",
    route(async (req, res) => {
      const parsed = ReportFieldsSchema.safeParse(readBody(req));
      if (!parsed.success) {
        badRequest(res, "report fields must be strings or numbers");
        return;
      }
      const bytes = await renderReportPdf(parsed.data);
      res.setHeader("Content-Type", "application/pdf");
      res.setHeader("Content-Disposition", `attachment; filename="${reportFilename()}"`);
      res.send(Buffer.from(bytes));
    })
  );

  app.get("/", (_req, res) => {
    res.type("text").send(`code-assessment-backend ${getVersion()}`);
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = errorMessage(err, "Internal Server Error");
    safeLog(`[${req.method} ${req.path}] failed`, { status, error: message });
    res.status(status).json({ status: "error", message });
  });

  return app;
}
