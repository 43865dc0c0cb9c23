import express from "express";

export default function healthRouter(details?: () => unknown) {
  const router = express.Router();

  router.get("/health", (_req, res) => {
    res.json({ status: "healthy", service: "Intent Finder API" });
  });

  router.get("/health/details", (_req, res) => {
    res.json({ status: "healthy", now: new Date().toISOString(), ...(details ? { details: details() } : {}) });
  });

  return router;
}
