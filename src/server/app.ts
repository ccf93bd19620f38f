import express from "express";
import multer from "multer";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { AppConfig } from "../core/config.js";
import { composeName, extractDate } from "../core/extract.js";
import {
  InvalidTargetDirectoryError,
  planRenames,
  renameDirectory,
  type Logger,
} from "../core/rename.js";
import { makeUniqueName } from "../core/utils.js";

const MAX_UPLOADS = 50;

const ExtractRequest = z.object({
  filenames: z.array(z.string()).max(1000),
  includeTime: z.boolean().optional(),
});

const DirectoryRequest = z.object({
  directory: z.string().min(1),
  recursive: z.boolean().optional(),
  includeTime: z.boolean().optional(),
});

const ConfirmRequest = DirectoryRequest.extend({
  backup: z.boolean().optional(),
});

export type UploadResult = {
  originalName: string;
  newName: string | null;
  status: "renamed" | "skipped" | "error";
};

function describeIssues(error: z.ZodError) {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

export function createApp({
  config,
  logger = console,
}: {
  config: AppConfig;
  logger?: Logger;
}) {
  const app = express();
  const upload = multer({ dest: config.uploadDir });

  app.use(express.json());

  function fail(res: express.Response, err: unknown, message: string) {
    if (err instanceof InvalidTargetDirectoryError) {
      res.status(400).json({ error: err.message });
      return;
    }
    logger.error(err);
    res.status(500).json({ error: message });
  }

  async function discardUploads(files: Express.Multer.File[]) {
    const results = await Promise.allSettled(
      files.map((f) => fs.rm(f.path, { force: true })),
    );
    for (const r of results) {
      if (r.status === "rejected") logger.error("  Could not remove upload:", r.reason);
    }
  }

  // API: Preview names for a list of filenames
  app.post("/api/extract", (req, res) => {
    const body = ExtractRequest.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: describeIssues(body.error) });
      return;
    }

    const options = {
      pivotYear: config.pivotYear,
      includeTime: body.data.includeTime ?? false,
    };
    const results = body.data.filenames.map((filename) => {
      const result = extractDate(filename, options);
      if (!result) {
        return { filename, found: false, date: null, residualName: null, target: null };
      }
      return {
        filename,
        found: true,
        date: result.canonicalDate,
        residualName: result.residualName,
        target: composeName(result),
      };
    });

    res.json({ results });
  });

  // API: Dry run over a directory
  app.post("/api/plan", async (req, res) => {
    const body = DirectoryRequest.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: describeIssues(body.error) });
      return;
    }

    try {
      const plan = await planRenames(body.data.directory, {
        recursive: body.data.recursive ?? false,
        includeTime: body.data.includeTime ?? false,
        pivotYear: config.pivotYear,
      });
      res.json({
        directory: plan.directory,
        actions: plan.actions.map((a) => ({
          source: a.relativeSource,
          target: a.relativeTarget,
          date: a.canonicalDate,
        })),
        skipped: plan.skipped,
      });
    } catch (err) {
      fail(res, err, "Planning failed");
    }
  });

  // API: Confirm batch, rename in place
  app.post("/api/confirm-batch", async (req, res) => {
    const body = ConfirmRequest.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: describeIssues(body.error) });
      return;
    }

    try {
      const summary = await renameDirectory(body.data.directory, {
        recursive: body.data.recursive ?? false,
        includeTime: body.data.includeTime ?? false,
        pivotYear: config.pivotYear,
        backup: body.data.backup ? (config.backupDir ?? true) : false,
        auditLog: config.auditLog,
        logger,
      });
      res.json(summary);
    } catch (err) {
      fail(res, err, "Batch rename failed");
    }
  });

  // API: Upload files and file them under their normalized names
  app.post(
    "/api/upload-batch",
    upload.array("files", MAX_UPLOADS),
    async (req, res) => {
      const files = Array.isArray(req.files) ? req.files : [];
      if (!files.length) {
        res.status(400).json({ error: "No files uploaded" });
        return;
      }

      try {
        await fs.mkdir(config.outputDir, { recursive: true });
        const taken = new Set(await fs.readdir(config.outputDir));
        const results: UploadResult[] = [];

        logger.log(`\nFiling ${files.length} upload(s)...`);
        for (const file of files) {
          const originalName = path.basename(file.originalname);
          try {
            const result = extractDate(originalName, { pivotYear: config.pivotYear });
            if (!result) {
              await fs.unlink(file.path);
              results.push({ originalName, newName: null, status: "skipped" });
              continue;
            }

            const newName = makeUniqueName(composeName(result), (n) => taken.has(n));
            taken.add(newName);
            await fs.rename(file.path, path.join(config.outputDir, newName));
            logger.log(`  Moved: ${originalName} → ${newName}`);
            results.push({ originalName, newName, status: "renamed" });
          } catch (err) {
            logger.error(`  Failed: ${originalName}`, err);
            await discardUploads([file]);
            results.push({ originalName, newName: null, status: "error" });
          }
        }

        res.json({ results });
      } catch (err) {
        await discardUploads(files);
        fail(res, err, "Upload failed");
      }
    },
  );

  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      if (err instanceof multer.MulterError) {
        res.status(400).json({ error: err.message });
        return;
      }
      if (err instanceof SyntaxError) {
        res.status(400).json({ error: "Invalid JSON body" });
        return;
      }
      fail(res, err, "Request failed");
    },
  );

  return app;
}
