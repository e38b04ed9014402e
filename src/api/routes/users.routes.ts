import { Router } from 'express';
import * as usersController from '@/controllers/users.controller';
import { userMutationRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

/**
 * POST /user
 * Create a user (stricter rate limiting)
 */
router.post('/user', userMutationRateLimiter, usersController.createUser);

/**
 * GET /users
 * List all users
 */
router.get('/users', usersController.getAllUsers);

/**
 * DELETE /user/:username
 * Delete a user by user name (stricter rate limiting)
 */
router.delete('/user/:username', userMutationRateLimiter, usersController.deleteUser);

export default router;
