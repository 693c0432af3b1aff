/**
 * Controller Tests
 *
 * Tests for the base controller, form handling and request dispatch.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { fileURLToPath } from 'node:url';
import { Config } from '../../framework/config/config.ts';
import { action, Controller, ValidationError, validateData } from '../../framework/controller/base.ts';
import { FormController } from '../../framework/controller/form.ts';
import { HttpRequest } from '../../framework/http/request.ts';
import { Logger, setLogger, type LogEntry } from '../../framework/telemetry/logger.ts';
import { TurboFormMixin } from '../../framework/turbo/mixins.ts';
import { TemplateEngine } from '../../framework/view/template.ts';

const viewsPath = fileURLToPath(new URL('../fixtures/views', import.meta.url));
const engine = new TemplateEngine({ viewsPath });

function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogger(new Logger({ level: 'debug', output: (entry) => entries.push(entry) }));
  return entries;
}

function postForm(fields: Record<string, string>): Request {
  return new Request('http://localhost/signup', {
    method: 'POST',
    body: new URLSearchParams(fields),
  });
}

const emailSchema = {
  email: { required: true, pattern: /^[^@\s]+@[^@\s]+$/ },
};

class SignupController extends FormController {
  templateName = 'signup.html';
  successUrl = '/thanks';
  schema = emailSchema;
}

class TurboSignupController extends TurboFormMixin(SignupController) {}

class UnconfiguredSignupController extends FormController {
  schema = emailSchema;
}

// Controller

test('Controller - getTemplateNames requires a template name', () => {
  class PageController extends Controller {}
  assert.throws(() => new PageController().getTemplateNames(), {
    name: 'ImproperlyConfiguredError',
    message: 'PageController requires either a templateName or an implementation of getTemplateNames()',
  });
});

test('Controller - renderToResponse renders the template with route params', () => {
  class PageController extends Controller {
    templateName = 'page.html';
  }

  const pages = new TemplateEngine().registerTemplate('page.html', '<h1>{{ title }}</h1><p>{{ params.id }}</p>');
  const request = new HttpRequest(new Request('http://localhost/pages/5'), { params: { id: '5' } });
  const controller = new PageController().setContext(request, pages);

  const response = controller.renderToResponse(controller.getContextData({ title: 'Hi' }));
  assert.equal(response.isRendered, false);
  assert.equal(response.render().text(), '<h1>Hi</h1><p>5</p>');
});

test('Controller - requireParam rejects missing params', () => {
  const controller = new Controller().setContext(new HttpRequest(new Request('http://localhost/')), engine);
  assert.throws(() => controller.requireParam('id'), { message: "Required parameter 'id' is missing" });
});

test('Controller - queryParam falls back to the default', () => {
  const controller = new Controller().setContext(new HttpRequest(new Request('http://localhost/?page=2')), engine);
  assert.equal(controller.queryParam('page'), '2');
  assert.equal(controller.queryParam('size', '10'), '10');
});

// Validation

test('validateData - reports one message per failed rule', () => {
  const errors = validateData(
    { name: 'a', age: 150, email: '' },
    {
      name: { type: 'string', minLength: 2 },
      age: { type: 'number', max: 120 },
      email: { required: true, pattern: /@/ },
    }
  );
  assert.deepEqual(errors, ['name must be at least 2 characters', 'age must be at most 120', 'email is required']);
});

test('Controller.validate - throws ValidationError with the messages', () => {
  const controller = new Controller();
  assert.throws(
    () => controller.validate({ count: 'x' }, { count: { type: 'number' } }),
    (error: unknown) => error instanceof ValidationError && error.errors[0] === 'count must be a number'
  );
});

// FormController via action()

test('FormController - invalid submissions re-render with 200', async () => {
  captureLogs();
  const handler = action(SignupController, (c) => c.post(), engine);
  const response = await handler(postForm({ email: 'nope' }));
  assert.equal(response.status, 200);
  assert.equal(await response.text(), '<p>email format is invalid</p>');
});

test('TurboFormMixin - invalid submissions answer 422 with the same body', async () => {
  captureLogs();
  const handler = action(TurboSignupController, (c) => c.post(), engine);
  const response = await handler(postForm({ email: 'nope' }));
  assert.equal(response.status, 422);
  assert.equal(response.headers.get('Content-Type'), 'text/html; charset=utf-8');
  assert.equal(await response.text(), '<p>email format is invalid</p>');
});

test('TurboFormMixin - empty submissions report the required field', async () => {
  captureLogs();
  const handler = action(TurboSignupController, (c) => c.post(), engine);
  const response = await handler(postForm({ email: '' }));
  assert.equal(response.status, 422);
  assert.equal(await response.text(), '<p>email is required</p>');
});

test('TurboFormMixin - valid submissions still redirect with 303', async () => {
  captureLogs();
  const handler = action(TurboSignupController, (c) => c.post(), engine);
  const response = await handler(postForm({ email: 'a@b.c' }));
  assert.equal(response.status, 303);
  assert.equal(response.headers.get('Location'), '/thanks');
});

// Dispatch errors

test('action - configuration errors become a diagnostic page in debug', async () => {
  const entries = captureLogs();
  const handler = action(UnconfiguredSignupController, (c) => c.post(), engine, { debug: true });
  const response = await handler(postForm({ email: 'a@b.c' }));

  assert.equal(response.status, 500);
  assert.equal(
    await response.text(),
    '<h1>ImproperlyConfiguredError</h1><pre>No URL to redirect to. Provide a successUrl.</pre>'
  );
  assert.equal(entries.length, 1);
  assert.equal(entries[0]?.level, 'error');
  assert.equal(entries[0]?.message, 'Handler is improperly configured');
  assert.equal(entries[0]?.error?.name, 'ImproperlyConfiguredError');
  assert.equal(entries[0]?.context?.controller, 'UnconfiguredSignupController');
  assert.equal(entries[0]?.context?.method, 'POST');
  assert.equal(entries[0]?.context?.path, '/signup');
});

test('action - configuration errors are rethrown outside debug', async () => {
  const entries = captureLogs();
  const handler = action(UnconfiguredSignupController, (c) => c.post(), engine);
  await assert.rejects(handler(postForm({ email: 'a@b.c' })), {
    name: 'ImproperlyConfiguredError',
    message: 'No URL to redirect to. Provide a successUrl.',
  });
  assert.equal(entries.length, 1);
});

test('action - debug defaults to the configured value', async () => {
  captureLogs();
  const handler = action(UnconfiguredSignupController, (c) => c.post(), engine, {
    config: new Config({ debug: true }),
  });
  const response = await handler(postForm({ email: 'a@b.c' }));
  assert.equal(response.status, 500);
});

test('action - an explicit debug option wins over configuration', async () => {
  captureLogs();
  const handler = action(UnconfiguredSignupController, (c) => c.post(), engine, {
    debug: false,
    config: new Config({ debug: true }),
  });
  await assert.rejects(handler(postForm({ email: 'a@b.c' })), { name: 'ImproperlyConfiguredError' });
});

test('action - other errors propagate without logging', async () => {
  const entries = captureLogs();
  const handler = action(
    Controller,
    () => {
      throw new Error('boom');
    },
    engine,
    { debug: true }
  );
  await assert.rejects(handler(new Request('http://localhost/')), { message: 'boom' });
  assert.equal(entries.length, 0);
});

test('action - passes route params to the controller', async () => {
  captureLogs();
  const handler = action(Controller, (c) => c.html(`<p>${c.requireParam('id')}</p>`), engine, {
    params: { id: '12' },
  });
  const response = await handler(new Request('http://localhost/items/12'));
  assert.equal(await response.text(), '<p>12</p>');
});
