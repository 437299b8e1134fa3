import { Router } from "express";
import { ROOT_PAYLOAD } from "../responses/payloads";

const router = Router();

/**
 * GET /
 * Greeting. Points callers at the API viewer.
 */
router.get("/", (_req, res) => {
  res.status(200).json(ROOT_PAYLOAD);
});

export default router;
