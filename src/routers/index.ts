import express from "express";
import apiRouter, { type RagAvailability } from "./apiRouters";

const initRoutes = (rag: RagAvailability): express.Router => {
  const router = express.Router();
  router.use("/v1", apiRouter(rag));
  return router;
};

export default initRoutes;
