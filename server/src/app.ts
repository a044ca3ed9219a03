import fs from "node:fs";
import path from "node:path";
import express, { type NextFunction, type Request, type Response } from "express";
import { hasAllowedExtension } from "./catalog";
import type { AppConfig } from "./config";
import type { AnnotationStore } from "./datastore";
import { AppError, InvalidRating, StorageUnavailable } from "./errors";
import { log } from "./log";
import type { NavigationController } from "./navigation";
import { buildExport, progressStats, summarize } from "./stats";
import type { SessionView } from "./types";

/** Everything a request handler may touch. */
export interface AppContext {
  config: AppConfig;
  store: AnnotationStore;
  session: NavigationController;
  /** ISO-8601 timestamps for writes. */
  now?: () => string;
  /** Built front end to serve, when present. */
  staticDir?: string;
}

const IMAGE_CACHE_MS = 60 * 60 * 1000;

const RATING_PATTERN = /^\d+$/;

export function imageUrl(imageIdentifier: string): string {
  return `/images/${imageIdentifier.split("/").map(encodeURIComponent).join("/")}`;
}

export function buildView({ config, store, session }: AppContext): SessionView {
  const image = session.current();
  const record = store.get(image);
  return {
    title: config.title,
    description: config.description,
    num_classes: config.numClasses,
    images_folder: config.imagesFolder,
    index: session.currentIndex,
    total: session.images.length,
    image_identifier: image,
    image_url: imageUrl(image),
    rating: record?.rating ?? 0,
    marked: record?.marked ?? false,
    stats: progressStats(session.images, store.listAll()),
    can_undo: session.historySize > 0,
    history_size: session.historySize,
    filter_unannotated: session.isFiltering,
    at_start: session.currentIndex === 0,
    at_end: session.currentIndex === session.images.length - 1,
  };
}

function usernameFrom(req: Request, fallback: string): string {
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && "username" in body) {
    const { username } = body;
    if (typeof username === "string" && username.trim() !== "") {
      return username.trim();
    }
  }
  return fallback;
}

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err) {
    const { status } = err;
    if (typeof status === "number" && status >= 400 && status < 500) return status;
  }
  return undefined;
}

function imageRouter(ctx: AppContext) {
  const { imagesFolder, allowedExtensions } = ctx.config;
  const root = path.resolve(imagesFolder);
  const catalog = new Set(ctx.session.images);
  const router = express.Router();

  router.get("*", (req, res, next) => {
    let relative: string;
    try {
      relative = decodeURIComponent(req.path).slice(1);
    } catch {
      res.status(400).json({ detail: "Invalid path", code: "invalid_path" });
      return;
    }

    if (relative.startsWith("/") || relative.split(/[\\/]/).includes("..")) {
      res.status(400).json({ detail: "Invalid path", code: "invalid_path" });
      return;
    }
    if (!hasAllowedExtension(relative, allowedExtensions)) {
      res.status(400).json({ detail: "Invalid file type", code: "invalid_file_type" });
      return;
    }
    const absolute = path.resolve(root, relative);
    if (!absolute.startsWith(root + path.sep)) {
      res.status(403).json({ detail: "Access denied", code: "access_denied" });
      return;
    }
    if (!catalog.has(relative) || !fs.existsSync(absolute)) {
      res.status(404).json({ detail: "Image not found", code: "not_found" });
      return;
    }

    res.sendFile(absolute, { maxAge: IMAGE_CACHE_MS }, (err) => {
      if (err) next(err);
    });
  });

  return router;
}

function apiRouter(ctx: AppContext) {
  const { config, store, session } = ctx;
  const now = ctx.now ?? (() => new Date().toISOString());
  const router = express.Router();

  router.get("/session", (_req, res) => {
    res.json(buildView(ctx));
  });

  router.post("/rate/:rating", (req, res) => {
    const { rating } = req.params;
    if (!RATING_PATTERN.test(rating)) {
      throw new InvalidRating(rating, config.numClasses);
    }
    session.rate(Number(rating), usernameFrom(req, config.username), now());
    res.json(buildView(ctx));
  });

  router.post("/mark", (req, res) => {
    session.toggleMark(usernameFrom(req, config.username), now());
    res.json(buildView(ctx));
  });

  router.post("/prev", (_req, res) => {
    session.prev();
    res.json(buildView(ctx));
  });

  router.post("/next", (_req, res) => {
    session.next();
    res.json(buildView(ctx));
  });

  router.post("/undo", (_req, res) => {
    session.undo();
    res.json(buildView(ctx));
  });

  router.post("/filter", (_req, res) => {
    session.toggleFilter();
    res.json(buildView(ctx));
  });

  router.get("/summary", (_req, res) => {
    res.json(summarize(store.listAll()));
  });

  router.get("/export", (_req, res) => {
    res.json(buildExport(config.imagesFolder, store.listAll(), now()));
  });

  return router;
}

export function createApp(ctx: AppContext) {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json());

  app.use("/api", apiRouter(ctx));
  app.use("/images", imageRouter(ctx));

  const { staticDir } = ctx;
  if (staticDir && fs.existsSync(path.join(staticDir, "index.html"))) {
    app.use(express.static(staticDir));
    app.get(/^\/(?!api\/|images\/).*/, (_req, res) => {
      res.sendFile(path.resolve(staticDir, "index.html"));
    });
  }

  app.use((req, res) => {
    res.status(404).json({ detail: `No route for ${req.method} ${req.path}`, code: "not_found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      if (err instanceof StorageUnavailable) {
        log.error(err.message);
      }
      res.status(err.status).json({ detail: err.message, code: err.code });
      return;
    }

    const status = httpStatusOf(err);
    if (status !== undefined) {
      res.status(status).json({
        detail: err instanceof Error ? err.message : "Bad request",
        code: "bad_request",
      });
      return;
    }

    log.error("Unhandled error:", err);
    res.status(500).json({ detail: "Internal server error", code: "internal_error" });
  });

  return app;
}
