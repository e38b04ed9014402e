import { z, ZodError } from 'zod';
import { USER_FIELD_LIMITS } from '@/config/businessRules';

const EMPTY_STRING_MESSAGE = 'String should not be empty';

const requiredName = z
  .string()
  .min(1, { message: EMPTY_STRING_MESSAGE })
  .max(USER_FIELD_LIMITS.MAX_NAME_LENGTH, {
    message: `String should not exceed ${USER_FIELD_LIMITS.MAX_NAME_LENGTH} characters`,
  });

/**
 * User creation validation schema
 *
 * - userName, firstName and lastName must be non-empty strings
 * - address is optional; null is treated as absent
 */
export const createUserSchema = z.object({
  userName: requiredName,
  firstName: requiredName,
  lastName: requiredName,
  address: z
    .string()
    .max(USER_FIELD_LIMITS.MAX_ADDRESS_LENGTH, {
      message: `String should not exceed ${USER_FIELD_LIMITS.MAX_ADDRESS_LENGTH} characters`,
    })
    .nullish()
    .transform((address) => address ?? undefined),
});

export type CreateUserPayload = z.infer<typeof createUserSchema>;

/**
 * Render zod issues as `.field(message)` entries joined by ", "
 * Issues without a path (e.g. a non-object body) render as the bare message.
 *
 * @example formatIssues(error) // ".userName(String should not be empty)"
 */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `.${issue.path.join('.')}(${issue.message})` : issue.message
    )
    .join(', ');
}
