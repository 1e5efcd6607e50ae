import express from 'express';
import type { GalleryContext } from '../context.js';
import { adminRouter } from '../routes/admin.js';
import { galleryRouter } from '../routes/gallery.js';

const BUILD_TIME = new Date().toISOString();

export function createApp(ctx: GalleryContext): express.Express {
  const app = express();

  // Uploads arrive as base64 JSON
  app.use(express.json({ limit: '50mb' }));
  app.use(express.urlencoded({ extended: true, limit: '50mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), buildTime: BUILD_TIME });
  });

  app.use(ctx.publicImagePrefix, express.static(ctx.imagesDir, { index: false, dotfiles: 'ignore' }));
  app.use(galleryRouter(ctx));
  app.use(adminRouter(ctx));

  return app;
}
