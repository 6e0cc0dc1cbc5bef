// src/routes/photo.routes.ts
import express, { RequestHandler, Router } from 'express';
import { createPhotoController } from '../controllers/photo.controller';
import { validatePhoto } from '../middlewares/validation.middleware';
import { DocumentCollection } from '../services/documentStore';

export const createPhotoRouter = (photos: DocumentCollection, authMiddleware: RequestHandler): Router => {
  const router: Router = express.Router();
  const photoController = createPhotoController(photos);

  router.use(authMiddleware);

  router.get('/:userId', photoController.getPhotosOfUser);
  router.post('/', validatePhoto, photoController.addPhoto);
  router.delete('/:filepath', photoController.deletePhoto);

  return router;
};

export default createPhotoRouter;
