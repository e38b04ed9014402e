/**
 * Dependency Container
 * Instantiates and wires the repository, service and program
 *
 * This is the single source of truth for dependency injection.
 * Controllers import the program from here; tests replace this module.
 */

import { UserRepository } from '@/repositories/user.repository';
import { UserService } from '@/services/user.service';
import { UserProgram } from '@/programs/user.program';
import { IUserProgram } from '@/programs/interfaces/IUserProgram';

// ============================================================================
// REPOSITORIES
// ============================================================================

export const userRepository = new UserRepository();

// ============================================================================
// SERVICES
// ============================================================================

export const userService = new UserService(userRepository);

// ============================================================================
// PROGRAMS
// ============================================================================

/**
 * User Program
 * Transaction boundary and error translation for every user endpoint
 */
export const userProgram: IUserProgram = new UserProgram(userService);
