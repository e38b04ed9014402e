/**
 * Central export point for all models
 * Allows clean imports: import { User, UserRow } from '@/models'
 */

export * from './User';
