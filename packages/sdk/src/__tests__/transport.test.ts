/**
 * Tests for the HTTP transport: URL building, raw responses, agent ownership.
 */

import { describe, it, before, after, mock } from 'node:test';
import assert from 'node:assert/strict';
import { Agent } from 'node:http';
import { HttpTransport } from '../transport.js';
import { StubServer } from './stub-server.js';

describe('HttpTransport', () => {
  let server: StubServer;

  before(async () => {
    server = await new StubServer().start();
  });

  after(async () => {
    await server.stop();
  });

  it('appends query parameters with booleans as true/false', () => {
    const transport = new HttpTransport('http://localhost:8080', 1000);
    const url = transport.buildUrl('/chats/list', { limit: 5, archived: false, chat_type: 'group chat' });
    assert.equal(url.toString(), 'http://localhost:8080/chats/list?limit=5&archived=false&chat_type=group+chat');
    transport.close();
  });

  it('resolves non-2xx responses instead of rejecting', async () => {
    const transport = new HttpTransport(server.url, 1000);
    server.enqueue({ status: 418, body: 'teapot' });
    try {
      const res = await transport.send({ method: 'GET', path: '/health' });
      assert.equal(res.status, 418);
      assert.equal(res.body, 'teapot');
    } finally {
      transport.close();
    }
  });

  it('sends a Content-Length header with JSON bodies', async () => {
    const transport = new HttpTransport(server.url, 1000);
    try {
      await transport.send({ method: 'PUT', path: '/messages/edit', body: { new_text: 'héllo' } });
      assert.equal(server.last.rawBody, '{"new_text":"héllo"}');
      assert.equal(server.last.headers['content-length'], String(Buffer.byteLength('{"new_text":"héllo"}')));
    } finally {
      transport.close();
    }
  });

  it('uses the supplied agent and destroys it once', () => {
    const agent = new Agent();
    const destroy = mock.method(agent, 'destroy');
    const transport = new HttpTransport(server.url, 1000, agent);

    assert.equal(transport.closed, false);
    transport.close();
    transport.close();

    assert.equal(transport.closed, true);
    assert.equal(destroy.mock.callCount(), 1);
  });
});
