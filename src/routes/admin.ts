import express from 'express';
import { z } from 'zod';
import type { GalleryContext } from '../context.js';
import { parseFields } from '../settings/ai-config.js';
import { sendError } from './errors.js';

const MetadataBody = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  caption: z.string().optional(),
  author: z.string().optional(),
  copyright: z.string().optional(),
  tags: z.union([z.array(z.string()), z.string()]).optional(),
});

const ImagesBody = z.object({
  images: z.array(z.string().min(1)).min(1),
});

const RegenerateBody = ImagesBody.extend({
  force: z.boolean().optional(),
  fields: z.array(z.string()).transform(parseFields).optional(),
});

const UploadBody = z.object({
  files: z.array(z.object({ name: z.string().min(1), data: z.string() })).min(1),
});

const ImportPathBody = z.object({
  path: z.string().min(1),
});

const ConfigBody = z.object({
  ai: z.record(z.unknown()).optional(),
  advanced: z.record(z.unknown()).optional(),
});

export function adminRouter(ctx: GalleryContext): express.Router {
  const router = express.Router();

  router.get('/admin/api/gallery', async (_req, res) => {
    try {
      res.json(await ctx.reconciler.scanInventory({ allowSidecarCreation: true, allowEnrichment: false }));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/admin/upload', async (req, res) => {
    try {
      const { files } = UploadBody.parse(req.body);
      res.json(await ctx.review.importUploads(files));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/admin/import-path', async (req, res) => {
    try {
      const body = ImportPathBody.parse(req.body);
      res.json(await ctx.review.importFromPath(body.path));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/admin/update-metadata/:name', async (req, res) => {
    try {
      const edits = MetadataBody.parse(req.body);
      res.json(await ctx.review.saveMetadata(req.params.name, edits));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/admin/accept', async (req, res) => {
    try {
      const { images } = ImagesBody.parse(req.body);
      res.json(await ctx.review.acceptImages(images));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/admin/ai/regenerate', async (req, res) => {
    try {
      const { images, force, fields } = RegenerateBody.parse(req.body);
      res.json(await ctx.review.regenerate(images, { force, fields }));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.delete('/admin/image/:name', async (req, res) => {
    try {
      await ctx.review.deleteImage(req.params.name);
      res.json({ deleted: req.params.name });
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/admin/config', (_req, res) => {
    res.json(ctx.settings.snapshot());
  });

  router.post('/admin/config', async (req, res) => {
    try {
      const patch = ConfigBody.parse(req.body);
      res.json(await ctx.settings.update(patch));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/admin/config/reset', async (_req, res) => {
    try {
      res.json(await ctx.settings.reset());
    } catch (e) {
      sendError(res, e);
    }
  });

  return router;
}
