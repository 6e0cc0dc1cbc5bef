// src/routes/auth.routes.ts
import express, { RequestHandler, Router } from 'express';
import { createAuthController } from '../controllers/auth.controller';
import { validateCredentials, validateLogin } from '../middlewares/validation.middleware';
import { AuthService } from '../services/auth.service';

export const createAuthRouter = (auth: AuthService, authMiddleware: RequestHandler): Router => {
  const router: Router = express.Router();
  const authController = createAuthController(auth);

  /**
   * @route   POST api/auth/register
   * @desc    Register a new user
   * @access  Public
   */
  router.post('/register', validateCredentials, authController.register);

  /**
   * @route   POST api/auth/login
   * @desc    Authenticate user & get token
   * @access  Public
   */
  router.post('/login', validateLogin, authController.login);

  /**
   * @route   POST api/auth/logout
   * @desc    Log out on every device
   * @access  Private
   */
  router.post('/logout', authMiddleware, authController.logout);

  return router;
};

export default createAuthRouter;
