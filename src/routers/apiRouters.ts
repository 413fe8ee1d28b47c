import express from "express";
import type { RagContext, RagError } from "../rag";
import chatRouter, { unavailableChatRouter } from "./chatRouter";

export type RagAvailability =
  | { ready: true; context: RagContext }
  | { ready: false; error: RagError };

const apiRouter = (rag: RagAvailability): express.Router => {
  const router = express.Router();

  router.get("/health", (_, res) => {
    res.status(200).json({ status: "ok", ready: rag.ready });
  });

  router.use(
    "/chat",
    rag.ready ? chatRouter(rag.context.rag) : unavailableChatRouter(rag.error)
  );

  return router;
};

export default apiRouter;
