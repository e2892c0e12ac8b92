import test from 'node:test';
import assert from 'node:assert/strict';

import { Recording } from '../src/recording/recording.js';
import { atFrame } from '../src/recording/types.js';
import { handleViewerMessage, helloMessage } from '../src/server/viewerServer.js';

const document = () => {
  const recording = new Recording('motionvis');
  recording.logViewCoordinates('world', '-Y');
  recording.logMesh('world/phase_fit/#0', atFrame(0), {
    vertices: [0, 0, 0, 1, 0, 0, 0, 1, 0],
    indices: [0, 1, 2],
  });
  recording.logCleared('world/phase_fit/#0', atFrame(2));
  recording.logRigidTransform('world/camera', atFrame(3), [0, 0, 1], [0, 0, 0, 1]);
  return recording.toDocument();
};

test('the greeting summarises the recording', () => {
  assert.deepEqual(helloMessage(document()), {
    type: 'hello',
    applicationId: 'motionvis',
    timelines: ['input_frame_id'],
    frameCount: 4,
    entities: [
      { path: 'world', counts: { 'view-coordinates': 1 } },
      { path: 'world/camera', counts: { transform: 1 } },
      { path: 'world/phase_fit/#0', counts: { mesh: 1, clear: 1 } },
    ],
  });
});

test('seek returns the latest-at scene', () => {
  const doc = document();
  const paths = (frame: number) => {
    const reply = handleViewerMessage(doc, JSON.stringify({ type: 'seek', frame }));
    assert.equal(reply.type, 'scene');
    return reply.type === 'scene' ? reply.entities.map((entity) => entity.path) : [];
  };
  assert.deepEqual(paths(1), ['world', 'world/phase_fit/#0']);
  assert.deepEqual(paths(2), ['world']);
  assert.deepEqual(paths(3), ['world', 'world/camera']);
});

test('hello can be requested again', () => {
  const doc = document();
  assert.deepEqual(handleViewerMessage(doc, '{"type":"hello"}'), helloMessage(doc));
});

test('malformed messages get an error reply', () => {
  const doc = document();
  assert.deepEqual(handleViewerMessage(doc, '[1]'), { type: 'error', message: 'Message must be a JSON object' });
  assert.deepEqual(handleViewerMessage(doc, '{"type":"seek","frame":-1}'), {
    type: 'error',
    message: 'seek requires a non-negative integer "frame"',
  });
  assert.deepEqual(handleViewerMessage(doc, '{"type":"seek"}'), {
    type: 'error',
    message: 'seek requires a non-negative integer "frame"',
  });
  assert.deepEqual(handleViewerMessage(doc, '{"type":"play"}'), {
    type: 'error',
    message: 'Unknown message type "play"',
  });
  assert.deepEqual(handleViewerMessage(doc, '{}'), { type: 'error', message: 'Unknown message type null' });
  const invalid = handleViewerMessage(doc, '{');
  assert.equal(invalid.type, 'error');
  assert.ok(invalid.type === 'error' && invalid.message.startsWith('Invalid JSON message: '));
});
