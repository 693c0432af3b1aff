/**
 * Turbo Response Tests
 *
 * Tests for eager, template-deferred and streaming turbo responses.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { HttpRequest } from '../../framework/http/request.ts';
import { DEFAULT_CONTENT_TYPE } from '../../framework/http/response.ts';
import type { Content } from '../../framework/http/types.ts';
import type { TemplateContext, TemplateRenderer } from '../../framework/view/template.ts';
import { TemplateEngine } from '../../framework/view/template.ts';
import { Action, renderTurboStream } from '../../framework/turbo/renderers.ts';
import {
  TURBO_STREAM_CONTENT_TYPE,
  TurboFrameResponse,
  TurboFrameTemplateResponse,
  TurboStreamResponse,
  TurboStreamStreamingResponse,
  TurboStreamTemplateResponse,
} from '../../framework/turbo/response.ts';
import { ContentNotRenderedError } from '../../framework/errors.ts';

interface RenderCall {
  template: string | readonly string[];
  context: TemplateContext | undefined;
  request: HttpRequest | undefined;
}

class StubEngine implements TemplateRenderer {
  calls: RenderCall[] = [];

  constructor(private readonly body: Content) {}

  render(template: string | readonly string[], context?: TemplateContext, request?: HttpRequest): Content {
    this.calls.push({ template, context, request });
    return this.body;
  }
}

function createRequest(): HttpRequest {
  return new HttpRequest(new Request('http://localhost/cards/7'));
}

// TurboStreamResponse

test('TurboStreamResponse - wraps content and sets the stream content type', () => {
  const response = new TurboStreamResponse({ action: Action.Replace, target: 'msg-1', content: '<p>hi</p>' });
  assert.equal(response.text(), '<turbo-stream action="replace" target="msg-1"><p>hi</p></turbo-stream>');
  assert.equal(response.contentType, TURBO_STREAM_CONTENT_TYPE);
  assert.equal(response.statusCode, 200);
  assert.equal(response.isTurboStream, true);
});

test('TurboStreamResponse - content is identical on every access', () => {
  const response = new TurboStreamResponse({ action: Action.Append, target: 'log', content: '<li>1</li>' });
  assert.equal(response.content, response.content);
  assert.deepEqual(response.content, new TextEncoder().encode(response.text()));
});

test('TurboStreamResponse - passes status and headers to the transport', async () => {
  const response = new TurboStreamResponse({
    action: Action.Remove,
    target: 'msg-1',
    status: 201,
    headers: { 'X-Id': '9' },
  });
  const native = response.toResponse();
  assert.equal(native.status, 201);
  assert.equal(native.headers.get('X-Id'), '9');
  assert.equal(native.headers.get('Content-Type'), TURBO_STREAM_CONTENT_TYPE);
  assert.equal(await native.text(), '<turbo-stream action="remove" target="msg-1"></turbo-stream>');
});

// TurboFrameResponse

test('TurboFrameResponse - wraps content with the default content type', () => {
  const response = new TurboFrameResponse({ domId: 'frame-2', content: '<div>x</div>' });
  assert.equal(response.text(), '<turbo-frame id="frame-2"><div>x</div></turbo-frame>');
  assert.equal(response.contentType, DEFAULT_CONTENT_TYPE);
  assert.equal(response.domId, 'frame-2');
});

test('TurboFrameResponse - status can be rewritten after construction', () => {
  const response = new TurboFrameResponse({ domId: 'f', content: 'x' });
  response.statusCode = 422;
  assert.equal(response.toResponse().status, 422);
  assert.equal(response.text(), '<turbo-frame id="f">x</turbo-frame>');
});

// TurboFrameTemplateResponse

test('TurboFrameTemplateResponse - overlays frame keys and wraps the rendered body', () => {
  const engine = new StubEngine('<span>ok</span>');
  const request = createRequest();
  const response = new TurboFrameTemplateResponse({
    request,
    template: 'card.html',
    context: { x: 1 },
    domId: 'card-7',
    engine,
  });

  assert.equal(engine.calls.length, 0);
  response.render();

  assert.equal(engine.calls.length, 1);
  assert.deepEqual(engine.calls[0]?.context, { x: 1, turbo_frame_dom_id: 'card-7', is_turbo_frame: true });
  assert.deepEqual(engine.calls[0]?.template, ['card.html']);
  assert.equal(engine.calls[0]?.request, request);
  assert.equal(response.text(), '<turbo-frame id="card-7"><span>ok</span></turbo-frame>');
  assert.equal(response.contentType, DEFAULT_CONTENT_TYPE);
});

test('TurboFrameTemplateResponse - reserved keys win over caller keys', () => {
  const response = new TurboFrameTemplateResponse({
    request: createRequest(),
    template: 'card.html',
    context: { turbo_frame_dom_id: 'caller', is_turbo_frame: false },
    domId: 'card-7',
    engine: new StubEngine(''),
  });
  assert.equal(response.contextData.turbo_frame_dom_id, 'card-7');
  assert.equal(response.contextData.is_turbo_frame, true);
});

// TurboStreamTemplateResponse

test('TurboStreamTemplateResponse - context cannot be rewritten after construction', () => {
  const response = new TurboStreamTemplateResponse({
    request: createRequest(),
    template: 'x.html',
    action: Action.Replace,
    target: 'message-1',
    engine: new StubEngine(''),
  });
  assert.equal(Reflect.set(response.contextData, 'turbo_stream_target', 'other'), false);
  assert.equal(response.contextData.turbo_stream_target, 'message-1');
});

test('TurboStreamTemplateResponse - overlays stream keys and uses the stream content type', () => {
  const engine = new StubEngine('<p>{{ body }}</p>');
  const response = new TurboStreamTemplateResponse({
    request: createRequest(),
    template: ['messages/_message.html', 'message.html'],
    context: { body: 'hi' },
    action: Action.Append,
    target: 'messages',
    engine,
  });

  assert.deepEqual(response.contextData, {
    body: 'hi',
    turbo_stream_action: 'append',
    turbo_stream_target: 'messages',
    is_turbo_stream: true,
  });
  assert.deepEqual(response.templateNames, ['messages/_message.html', 'message.html']);
  assert.equal(response.contentType, TURBO_STREAM_CONTENT_TYPE);
  assert.throws(() => response.content, ContentNotRenderedError);
});

test('TurboStreamTemplateResponse - wraps the template output once', () => {
  const engine = new TemplateEngine().registerTemplate('message.html', '<p>{{ body }} via {{ turbo_stream_action }}</p>');
  const response = new TurboStreamTemplateResponse({
    request: createRequest(),
    template: ['missing.html', 'message.html'],
    context: { body: 'hi' },
    action: Action.Prepend,
    target: 'messages',
    engine,
  });

  assert.equal(
    response.render().text(),
    '<turbo-stream action="prepend" target="messages"><p>hi via prepend</p></turbo-stream>'
  );
});

test('TurboStreamTemplateResponse - render is idempotent, renderedContent is fresh', () => {
  const engine = new StubEngine('<i>x</i>');
  const response = new TurboStreamTemplateResponse({
    request: createRequest(),
    template: 'x.html',
    action: Action.Before,
    target: 't',
    engine,
  });

  response.render();
  response.render();
  assert.equal(engine.calls.length, 1);

  assert.equal(
    new TextDecoder().decode(response.renderedContent),
    '<turbo-stream action="before" target="t"><i>x</i></turbo-stream>'
  );
  assert.equal(engine.calls.length, 2);
});

test('TurboStreamTemplateResponse - toResponse renders with status and headers', async () => {
  const response = new TurboStreamTemplateResponse({
    request: createRequest(),
    template: 'x.html',
    action: Action.After,
    target: 't',
    engine: new StubEngine('y'),
    status: 201,
  });
  const native = response.toResponse();
  assert.equal(native.status, 201);
  assert.equal(native.headers.get('Content-Type'), TURBO_STREAM_CONTENT_TYPE);
  assert.equal(await native.text(), '<turbo-stream action="after" target="t">y</turbo-stream>');
});

// TurboStreamStreamingResponse

test('TurboStreamStreamingResponse - streams chunks from an iterable', async () => {
  function* messages(): Generator<Content> {
    yield renderTurboStream(Action.Append, 'log', '<li>1</li>');
    yield '<turbo-stream action="remove" target="x"></turbo-stream>';
  }

  const native = new TurboStreamStreamingResponse({ streamingContent: messages() }).toResponse();
  assert.equal(native.status, 200);
  assert.equal(native.headers.get('Content-Type'), TURBO_STREAM_CONTENT_TYPE);
  assert.equal(
    await native.text(),
    '<turbo-stream action="append" target="log"><li>1</li></turbo-stream>' +
      '<turbo-stream action="remove" target="x"></turbo-stream>'
  );
});

test('TurboStreamStreamingResponse - streams chunks from an async iterable', async () => {
  async function* messages(): AsyncGenerator<Content> {
    yield '<turbo-stream action="update" target="a">1</turbo-stream>';
    yield '<turbo-stream action="update" target="b">2</turbo-stream>';
  }

  const response = new TurboStreamStreamingResponse({ streamingContent: messages(), status: 202 });
  assert.equal(response.contentType, TURBO_STREAM_CONTENT_TYPE);
  const native = response.toResponse();
  assert.equal(native.status, 202);
  assert.equal(
    await native.text(),
    '<turbo-stream action="update" target="a">1</turbo-stream><turbo-stream action="update" target="b">2</turbo-stream>'
  );
});
