import express from "express";
import logger from "../logger";
import { RagError, type RAGService } from "../rag";

const STATUS_BY_CODE: Record<RagError["code"], number> = {
  INVALID_QUESTION: 400,
  UPSTREAM_FAILED: 502,
  INDEX_NOT_FOUND: 503,
  INDEX_MODEL_MISMATCH: 503,
  MISSING_CREDENTIAL: 503,
  SOURCE_UNREADABLE: 500,
  FETCH_FAILED: 500,
  INDEX_BUILD_FAILED: 500,
};

const CONVERSATION_NOT_FOUND = {
  success: false,
  code: "SESSION_NOT_FOUND",
  error: "Conversation not found",
} as const;

const sendError = (res: express.Response, error: unknown, endpoint: string) => {
  if (error instanceof RagError) {
    logger.warn(`Chat ${endpoint} endpoint failed`, { code: error.code, error: error.message });
    return res.status(STATUS_BY_CODE[error.code]).json({
      success: false,
      code: error.code,
      error: error.userMessage,
    });
  }

  logger.error(`Chat ${endpoint} endpoint failed`, { error });
  return res.status(500).json({ success: false, code: "INTERNAL_ERROR", error: "Internal server error" });
};

/** Answers every request with 503 when the service could not start. */
export const unavailableChatRouter = (startupError: RagError): express.Router => {
  const router = express.Router();
  router.use((_req, res) => {
    res.status(503).json({
      success: false,
      code: startupError.code,
      error: startupError.userMessage,
    });
  });
  return router;
};

const chatRouter = (rag: RAGService): express.Router => {
  const router = express.Router();

  router.post("/", async (req, res) => {
    const body: unknown = req.body;
    const question =
      typeof body === "object" && body !== null && "question" in body ? body.question : undefined;
    const sessionId =
      typeof body === "object" && body !== null && "sessionId" in body ? body.sessionId : undefined;

    if (typeof question !== "string" || !question.trim()) {
      return res
        .status(400)
        .json({ success: false, code: "INVALID_QUESTION", error: "question is required" });
    }
    if (sessionId !== undefined && typeof sessionId !== "string") {
      return res
        .status(400)
        .json({ success: false, code: "INVALID_REQUEST", error: "sessionId must be a string" });
    }

    try {
      const result = await rag.ask(question, sessionId);
      return res.status(200).json({ success: true, ...result });
    } catch (error) {
      return sendError(res, error, "ask");
    }
  });

  router.get("/:sessionId", (req, res) => {
    const session = rag.getSession(req.params.sessionId);
    if (!session) {
      return res.status(404).json(CONVERSATION_NOT_FOUND);
    }
    return res.status(200).json({ success: true, session });
  });

  router.delete("/:sessionId", (req, res) => {
    if (!rag.clearSession(req.params.sessionId)) {
      return res.status(404).json(CONVERSATION_NOT_FOUND);
    }
    return res.status(200).json({ success: true });
  });

  return router;
};

export default chatRouter;
