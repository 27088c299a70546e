import type { Request, RequestHandler } from "express";

const WINDOW_MS = 60_000;

function clientAddress(req: Request) {
  return req.ip || req.socket.remoteAddress || "unknown";
}

/**
 * Caps analysis runs per client address over a sliding minute.
 * Each address keeps the timestamps of its accepted requests inside the window.
 */
export function createAnalysisRateLimiter(perMinute: number): RequestHandler {
  const history = new Map<string, number[]>();
  let lastPrune = Date.now();

  function recentHits(address: string, now: number) {
    const hits = (history.get(address) ?? []).filter((time) => time > now - WINDOW_MS);
    if (hits.length) {
      history.set(address, hits);
    } else {
      history.delete(address);
    }
    return hits;
  }

  return (req, res, next) => {
    const now = Date.now();
    if (now - lastPrune >= WINDOW_MS) {
      for (const address of [...history.keys()]) {
        recentHits(address, now);
      }
      lastPrune = now;
    }

    const address = clientAddress(req);
    const hits = recentHits(address, now);
    if (hits.length >= perMinute) {
      const retryAfter = Math.max(1, Math.ceil((hits[0] + WINDOW_MS - now) / 1000));
      res.setHeader("Retry-After", `${retryAfter}`);
      return res.status(429).json({ message: "Analysis rate limit reached. Try again in a minute." });
    }

    hits.push(now);
    history.set(address, hits);
    res.setHeader("X-RateLimit-Limit", `${perMinute}`);
    res.setHeader("X-RateLimit-Remaining", `${perMinute - hits.length}`);
    return next();
  };
}
