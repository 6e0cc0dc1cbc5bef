// src/controllers/auth.controller.ts
import { Request, Response } from 'express';
import { AuthService } from '../services/auth.service';
import { AuthError } from '../utils/errors';
import { sendStoreError } from '../utils/httpErrors';
import '../types/request.types';

export const createAuthController = (auth: AuthService) => {
  /**
   * @route   POST api/auth/register
   * @desc    Register a new user
   * @access  Public
   */
  const register = async (req: Request, res: Response): Promise<Response> => {
    const { username, password } = req.body;

    try {
      const result = await auth.register(username, password);
      return res.status(201).json(result);
    } catch (err) {
      return sendStoreError(res, err, 'Error registering user');
    }
  };

  /**
   * @route   POST api/auth/login
   * @desc    Authenticate user & get token
   * @access  Public
   */
  const login = async (req: Request, res: Response): Promise<Response> => {
    const { username, password } = req.body;

    try {
      const result = await auth.login(username, password);
      if (!result) {
        return res.status(401).json({ message: 'Invalid credentials' });
      }
      return res.json(result);
    } catch (err) {
      return sendStoreError(res, err, 'Error logging in');
    }
  };

  /**
   * @route   POST api/auth/logout
   * @desc    Revoke the token and close the user's real-time connections
   * @access  Private
   */
  const logout = async (req: Request, res: Response): Promise<Response> => {
    if (!req.token) {
      return res.status(401).json({ message: 'Not authorized' });
    }

    try {
      await auth.logout(req.token);
      return res.json({ message: 'logged out' });
    } catch (err) {
      if (err instanceof AuthError) {
        return res.status(401).json({ message: 'Token is not valid' });
      }
      console.error('Error logging out:', err);
      return res.status(500).json({ message: 'Server error' });
    }
  };

  return { register, login, logout };
};
