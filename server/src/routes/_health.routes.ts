import { Router } from "express";

const router = Router();

router.get("/health", (req, res) => {
  res.json({ ok: true, dataset: req.analytics ? "loaded" : "failed" });
});

export default router;
