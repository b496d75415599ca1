import { Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { SessionRegistry } from "../screening/session-registry";
import { TurnResult } from "../shared/types/screening.types";

interface ChatControllerDeps {
  registry: SessionRegistry;
  logger: Logger;
}

const MAX_MESSAGE_LENGTH = 8000;

export function buildChatController(deps: ChatControllerDeps): Router {
  const router = Router();

  router.post("/sessions", (_request: Request, response: Response) => {
    try {
      const created = deps.registry.create();
      deps.logger.info("session.created", { sessionId: created.sessionId });
      response.status(201).json({
        ok: true,
        sessionId: created.sessionId,
        reply: created.greeting,
        state: created.flow.getState(),
        done: false,
      });
    } catch (error) {
      respondWithError(deps.logger, response, "Failed to create session", error);
    }
  });

  router.post("/sessions/:sessionId/messages", async (request: Request, response: Response) => {
    const sessionId = request.params.sessionId;
    const text = readMessageText(request.body);
    if (text === null) {
      response.status(400).json({ ok: false, error: "Body must be a JSON object with a string \"text\" field" });
      return;
    }
    if (text.length > MAX_MESSAGE_LENGTH) {
      response.status(400).json({ ok: false, error: `Message exceeds ${MAX_MESSAGE_LENGTH} characters` });
      return;
    }

    try {
      const result = await deps.registry.send(sessionId, text);
      if (!result) {
        response.status(404).json({ ok: false, error: "Session not found" });
        return;
      }
      response.status(200).json(toTurnPayload(sessionId, result));
    } catch (error) {
      respondWithError(deps.logger, response, "Failed to process message", error, sessionId);
    }
  });

  router.post("/sessions/:sessionId/end", async (request: Request, response: Response) => {
    const sessionId = request.params.sessionId;
    try {
      const result = await deps.registry.end(sessionId);
      if (!result) {
        response.status(404).json({ ok: false, error: "Session not found" });
        return;
      }
      response.status(200).json(toTurnPayload(sessionId, result));
    } catch (error) {
      respondWithError(deps.logger, response, "Failed to end session", error, sessionId);
    }
  });

  router.get("/sessions/:sessionId", (request: Request, response: Response) => {
    const flow = deps.registry.get(request.params.sessionId);
    if (!flow) {
      response.status(404).json({ ok: false, error: "Session not found" });
      return;
    }
    response.status(200).json({
      ok: true,
      sessionId: flow.sessionId,
      state: flow.getState(),
      record: flow.getRecord(),
    });
  });

  return router;
}

function readMessageText(body: unknown): string | null {
  if (!body || typeof body !== "object" || !("text" in body)) {
    return null;
  }
  return typeof body.text === "string" ? body.text : null;
}

function toTurnPayload(sessionId: string, result: TurnResult): Record<string, unknown> {
  return {
    ok: true,
    sessionId,
    reply: result.reply,
    state: result.state,
    done: result.done,
    notices: result.notices,
  };
}

function respondWithError(
  logger: Logger,
  response: Response,
  message: string,
  error: unknown,
  sessionId?: string,
): void {
  logger.error(message, {
    sessionId,
    error: error instanceof Error ? error.message : "Unknown error",
  });
  response.status(500).json({ ok: false, error: message });
}
