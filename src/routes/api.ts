import { Router } from "express";
import { API_ROOT_PAYLOAD, HEALTH_PAYLOAD } from "../responses/payloads";

const router = Router();

router.get("/", (_req, res) => {
  res.status(200).json(API_ROOT_PAYLOAD);
});

/**
 * GET /api/health
 * Must be fast. No I/O.
 */
router.get("/health", (_req, res) => {
  res.status(200).json(HEALTH_PAYLOAD);
});

export default router;
