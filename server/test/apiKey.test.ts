import assert from 'node:assert/strict';
import { IncomingMessage } from 'node:http';
import { Socket } from 'node:net';

import { ApiKeyDirectory, validateWebSocketApiKey } from '../auth/apiKey';

function requestWithHeaders(headers: IncomingMessage['headers']): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  req.headers = headers;
  return req;
}

export function runTests() {
  const directory = new ApiKeyDirectory(new Map([
    ['test-admin-token', 'admin'],
    ['test-alice-token', 'alice'],
  ]));

  assert.equal(directory.resolveAccount('test-alice-token'), 'alice');
  assert.equal(directory.resolveAccount('test-alice-token-2'), null);
  assert.equal(directory.resolveAccount(''), null);

  assert.equal(directory.resolveRequest(requestWithHeaders({ authorization: 'Bearer test-admin-token' })), 'admin');
  assert.equal(directory.resolveRequest(requestWithHeaders({ authorization: 'bearer test-admin-token' })), 'admin');
  assert.equal(directory.resolveRequest(requestWithHeaders({ authorization: 'Basic test-admin-token' })), null);
  assert.equal(directory.resolveRequest(requestWithHeaders({})), null);

  // Token in the WebSocket subprotocol list
  const encoded = Buffer.from('test-alice-token').toString('base64url');
  const wsReq = requestWithHeaders({ 'sec-websocket-protocol': `margin.v1, bearer.${encoded}` });
  assert.deepEqual(validateWebSocketApiKey(directory, wsReq), { ok: true, account: 'alice' });

  const rejected = validateWebSocketApiKey(directory, requestWithHeaders({ 'sec-websocket-protocol': 'margin.v1' }));
  assert.deepEqual(rejected, { ok: false, reason: 'invalid_api_key' });
}
