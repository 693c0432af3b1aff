/**
 * Form Controller
 *
 * Parses a submitted form, validates it and hands it to `formValid` or
 * `formInvalid`. Subclasses set `schema`, `templateName` and
 * `successUrl`, or override the two outcomes.
 */

import { ImproperlyConfiguredError } from '../errors.ts';
import type { ResponseLike } from '../http/types.ts';
import { HttpStatus } from '../http/types.ts';
import { Controller, validateData, type ValidationSchema } from './base.ts';

export interface Form {
  data: Record<string, string>;
  errors: string[];
  isValid: boolean;
}

export class FormController extends Controller {
  schema: ValidationSchema = {};
  successUrl?: string;

  /**
   * Read and validate the submitted form. File fields are ignored.
   */
  async getForm(): Promise<Form> {
    const formData = await this.request.formData();
    const data: Record<string, string> = {};
    formData.forEach((value, key) => {
      if (typeof value === 'string') {
        data[key] = value;
      }
    });

    const errors = validateData(data, this.schema);
    return { data, errors, isValid: errors.length === 0 };
  }

  async post(): Promise<ResponseLike> {
    const form = await this.getForm();
    return form.isValid ? this.formValid(form) : this.formInvalid(form);
  }

  /**
   * Redirect after a successful submission
   */
  formValid(_form: Form): ResponseLike {
    if (!this.successUrl) {
      throw new ImproperlyConfiguredError('No URL to redirect to. Provide a successUrl.');
    }
    return this.redirect(this.successUrl, HttpStatus.SEE_OTHER);
  }

  /**
   * Re-render the template with the rejected form
   */
  formInvalid(form: Form): ResponseLike {
    return this.renderToResponse(this.getContextData({ form }));
  }
}
