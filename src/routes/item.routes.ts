// src/routes/item.routes.ts
import express, { RequestHandler, Router } from 'express';
import { createItemController, ItemControllerDependencies } from '../controllers/item.controller';
import { validateItem, validateObjectId, validatePagination } from '../middlewares/validation.middleware';

export const createItemRouter = (deps: ItemControllerDependencies, authMiddleware: RequestHandler): Router => {
  const router: Router = express.Router();
  const itemController = createItemController(deps);

  // Apply auth middleware to all routes
  router.use(authMiddleware);

  router.get('/', validatePagination, itemController.getItems);
  router.get('/:id', validateObjectId('id'), itemController.getItem);
  router.post('/', validateItem, itemController.addItem);
  router.put('/:id', validateObjectId('id'), validateItem, itemController.editItem);
  router.delete('/:id', validateObjectId('id'), itemController.deleteItem);

  return router;
};

export default createItemRouter;
