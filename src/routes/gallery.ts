import express from 'express';
import type { GalleryContext } from '../context.js';
import { GalleryError, GalleryErrorCode } from '../lib/errors.js';
import { sendError } from './errors.js';

/** Visitor-facing reads; only reviewed artwork is exposed */
export function galleryRouter(ctx: GalleryContext): express.Router {
  const router = express.Router();

  router.get('/api/gallery', async (_req, res) => {
    try {
      const { gallery } = await ctx.reconciler.scanInventory({ allowSidecarCreation: false, allowEnrichment: false });
      res.json({ items: gallery });
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/api/artwork/:name', async (req, res) => {
    try {
      const item = await ctx.review.getItem(req.params.name);
      if (!item.reviewed) throw new GalleryError(GalleryErrorCode.NOT_FOUND, `Image not found: ${req.params.name}`);
      res.json(item);
    } catch (e) {
      sendError(res, e);
    }
  });

  return router;
}
