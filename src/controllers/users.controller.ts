import { Request, Response, NextFunction } from 'express';
import { userProgram } from '@/config/dependencies';
import { createUserSchema, formatIssues, CreateUserPayload } from '@/validators/user.validator';
import { MalformedBodyError } from '@/errors';
import { User } from '@/models';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Users Controller
 * Handles HTTP requests for user endpoints
 */

function toUser(payload: CreateUserPayload): User {
  const user: User = {
    userName: payload.userName,
    firstName: payload.firstName,
    lastName: payload.lastName,
  };
  if (payload.address !== undefined) {
    user.address = payload.address;
  }
  return user;
}

/**
 * POST /user
 * Create a user; responds 201 with the inserted row count
 */
export async function createUser(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = createUserSchema.safeParse(req.body);

    if (!validationResult.success) {
      const details = formatIssues(validationResult.error);
      logger.warn({ details }, 'Create user payload rejected');
      throw new MalformedBodyError(details);
    }

    const count = await userProgram.insertUser(toUser(validationResult.data));

    res.status(201).json({ count });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /users
 * List every user
 */
export async function getAllUsers(
  _req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const users = await userProgram.getAllUsers();

    res.json(users);
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE /user/:username
 * Delete a user by user name; responds 204
 */
export async function deleteUser(
  req: Request<{ username: string }>,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    await userProgram.deleteUserByUsername(req.params.username);

    res.status(204).json({});
  } catch (error) {
    next(error);
  }
}
