/**
 * Controllers
 *
 * Request handling logic that coordinates requests, templates and
 * responses.
 */

export {
  Controller,
  action,
  validateData,
  ValidationError,
  type ActionOptions,
  type ValidationSchema,
} from './base.ts';
export { FormController, type Form } from './form.ts';
