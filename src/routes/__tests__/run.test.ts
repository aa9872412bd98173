import { afterEach, describe, expect, it, vi } from 'vitest';
import { ModelEndpointError } from '../../utils/errors.js';
import { FakeExecutor, calls, final } from '../../services/orchestrator/__tests__/fakes.js';
import { createTestApp, parseSse, type TestApp } from './helpers.js';

const DF_OUTPUT = '/dev/sda1        40G   17G   23G  42% /';

describe.sequential('Run routes', () => {
  let harness: TestApp | undefined;

  afterEach(async () => {
    await harness?.app.close();
    harness = undefined;
  });

  describe('POST /v1/run', () => {
    it('returns the reply with the commands that ran and saves the exchange', async () => {
      harness = await createTestApp(
        [calls(['execute_command', { asset_name: 'web-1', command: 'df -h' }]), final('Root is 42% full.')],
        { executor: new FakeExecutor(() => ({ output: DF_OUTPUT, exitCode: 0 })) },
      );

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run',
        payload: { instruction: 'check disk usage on web-1' },
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('completed');
      expect(body.reply).toBe('Root is 42% full.');
      expect(body.commands).toHaveLength(1);
      expect(body.commands[0]).toMatchObject({ asset_name: 'web-1', command: 'df -h', result: DF_OUTPUT });
      expect(typeof body.trace_id).toBe('string');

      const session = await harness.sessions.get(body.session_id);
      expect(session?.title).toBe('check disk usage on web-1');
      expect(session?.messages.map(m => m.role)).toEqual(['user', 'assistant']);
    });

    it('continues a session with its history', async () => {
      harness = await createTestApp([final('web-1 is healthy.'), final('Still healthy.')]);

      const first = await harness.app.inject({
        method: 'POST',
        url: '/v1/run',
        payload: { instruction: 'how is web-1?' },
      });
      const sessionId = JSON.parse(first.body).session_id;

      const second = await harness.app.inject({
        method: 'POST',
        url: '/v1/run',
        payload: { instruction: 'and now?', session_id: sessionId },
      });

      expect(JSON.parse(second.body).session_id).toBe(sessionId);
      expect(harness.modelClient.conversations[1].slice(1)).toEqual([
        { role: 'user', content: 'how is web-1?' },
        { role: 'assistant', content: 'web-1 is healthy.' },
        { role: 'user', content: 'and now?' },
      ]);
      const session = await harness.sessions.get(sessionId);
      expect(session?.messages).toHaveLength(4);
    });

    it('passes the asset selection to the run', async () => {
      harness = await createTestApp([calls(['list_assets', {}]), final('Only db-1.')]);

      await harness.app.inject({
        method: 'POST',
        url: '/v1/run',
        payload: { instruction: 'list servers', asset_names: ['db-1'] },
      });

      const turns = harness.modelClient.conversations[1];
      expect(turns[turns.length - 1]).toMatchObject({ role: 'tool', content: '- db-1: root@10.0.0.12:22' });
    });

    it('treats an empty asset selection as no restriction', async () => {
      harness = await createTestApp(
        [calls(['execute_command', { asset_name: 'web-1', command: 'uptime' }]), final('web-1 is up.')],
        { executor: new FakeExecutor(() => ({ output: 'up 3 days', exitCode: 0 })) },
      );

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run',
        payload: { instruction: 'uptime on web-1', asset_names: [] },
      });

      expect(JSON.parse(response.body).status).toBe('completed');
      expect(harness.executor.runs).toEqual([{ asset: 'web-1', command: 'uptime' }]);
    });

    it('returns 400 for an empty instruction', async () => {
      harness = await createTestApp();

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run',
        payload: { instruction: '   ' },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('validation_error');
      expect(harness.modelClient.asks).toBe(0);
    });

    it('returns 400 for a malformed body', async () => {
      harness = await createTestApp();

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run',
        headers: { 'content-type': 'application/json' },
        payload: '{"instruction": ',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('bad_request');
    });

    it('returns 502 when the model endpoint fails and saves nothing', async () => {
      harness = await createTestApp([new ModelEndpointError('Model endpoint error (500): boom', 500)]);

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run',
        payload: { instruction: 'check disk' },
      });

      expect(response.statusCode).toBe(502);
      const body = JSON.parse(response.body);
      expect(body.error).toBe('model_endpoint_error');
      expect(body.message).toBe('Model endpoint error (500): boom');
      expect(await harness.sessions.list()).toEqual([]);
    });

    it('returns 503 when no model is configured', async () => {
      harness = await createTestApp([], { modelConfigured: false });

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run',
        payload: { instruction: 'check disk' },
      });

      expect(response.statusCode).toBe(503);
      expect(JSON.parse(response.body).error).toBe('service_unavailable');
    });
  });

  describe('POST /v1/run/stream', () => {
    it('streams start, command and reply events in order', async () => {
      harness = await createTestApp(
        [calls(['execute_command', { asset_name: 'web-1', command: 'df -h' }]), final('Root is 42% full.')],
        { executor: new FakeExecutor(() => ({ output: DF_OUTPUT, exitCode: 0 })) },
      );

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run/stream',
        payload: { instruction: 'check disk usage on web-1' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/event-stream');

      const events = parseSse(response.body);
      expect(events.map(e => e.event)).toEqual(['start', 'command_start', 'command_result', 'reply']);
      expect(events[1].data).toEqual({ asset_name: 'web-1', command: 'df -h' });
      expect(events[2].data).toEqual({ asset_name: 'web-1', command: 'df -h', result: DF_OUTPUT });
      expect(events[3].data).toEqual({ reply: 'Root is 42% full.' });

      const sessionId = String(events[0].data.session_id);
      const session = await harness.sessions.get(sessionId);
      expect(session?.messages[1]).toMatchObject({ role: 'assistant', content: 'Root is 42% full.' });
    });

    it('ends with an error event when the model fails', async () => {
      harness = await createTestApp([new ModelEndpointError('Model endpoint error: connect ECONNREFUSED')]);

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run/stream',
        payload: { instruction: 'check disk' },
      });

      const events = parseSse(response.body);
      expect(events.map(e => e.event)).toEqual(['start', 'error']);
      expect(events[1].data).toEqual({ message: 'Model endpoint error: connect ECONNREFUSED' });
      expect(await harness.sessions.list()).toEqual([]);

      const traceId = String(events[0].data.trace_id);
      const status = await harness.app.inject({ method: 'GET', url: `/v1/run/status/${traceId}` });
      expect(JSON.parse(status.body)).toMatchObject({ status: 'error', error: 'Model endpoint error: connect ECONNREFUSED' });
    });

    it('streams the text that comes with a tool call and keeps it in the run status', async () => {
      const narrated = calls(['execute_command', { asset_name: 'web-1', command: 'uptime' }]);
      narrated.text = 'Checking the load first.';
      harness = await createTestApp([narrated, final('Load is normal.')], {
        executor: new FakeExecutor(() => ({ output: 'up 3 days', exitCode: 0 })),
      });

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run/stream',
        payload: { instruction: 'how loaded is web-1?' },
      });

      const events = parseSse(response.body);
      expect(events.map(e => e.event)).toEqual(['start', 'model_reply', 'command_start', 'command_result', 'reply']);
      expect(events[1].data).toEqual({ round: 1, content: 'Checking the load first.' });

      const status = await harness.app.inject({ method: 'GET', url: `/v1/run/status/${String(events[0].data.trace_id)}` });
      expect(JSON.parse(status.body).model_replies).toEqual([{ round: 1, content: 'Checking the load first.' }]);
    });

    it('sends keep-alive comments while the model is thinking', async () => {
      const slowReply = async () => {
        await new Promise(resolve => setTimeout(resolve, 30));
        return final('Done thinking.');
      };
      harness = await createTestApp([slowReply], { sseKeepAliveMs: 5 });

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run/stream',
        payload: { instruction: 'think it over' },
      });

      expect(response.body).toContain(': keep-alive\n\n');
      const events = parseSse(response.body);
      expect(events.map(e => e.event)).toEqual(['start', 'reply']);
      expect(events[1].data).toEqual({ reply: 'Done thinking.' });
    });

    it('ends a stopped stream with the stop notice as its reply and saves it', async () => {
      let stopRun = () => {};
      const executor = new FakeExecutor(() => {
        stopRun();
        return { output: 'up 3 days', exitCode: 0 };
      });
      harness = await createTestApp(
        [calls(['execute_command', { asset_name: 'web-1', command: 'uptime' }]), final('never sent')],
        { executor },
      );
      const runs = harness.runs;
      const start = vi.spyOn(runs, 'start');
      stopRun = () => {
        runs.stop(String(start.mock.calls[0][0]));
      };

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run/stream',
        payload: { instruction: 'uptime on web-1' },
      });

      const reply = 'Stopped at user request. Commands that ran before the stop:\n- [web-1] uptime';
      const events = parseSse(response.body);
      expect(events.map(e => e.event)).toEqual(['start', 'command_start', 'reply']);
      expect(events[2].data).toEqual({ reply });
      expect(harness.modelClient.asks).toBe(1);

      const session = await harness.sessions.get(String(events[0].data.session_id));
      expect(session?.messages.map(m => [m.role, m.content])).toEqual([
        ['user', 'uptime on web-1'],
        ['assistant', reply],
      ]);

      const status = await harness.app.inject({ method: 'GET', url: `/v1/run/status/${String(events[0].data.trace_id)}` });
      expect(JSON.parse(status.body)).toMatchObject({ status: 'cancelled', reply });
    });

    it('validates the body before streaming', async () => {
      harness = await createTestApp();

      const response = await harness.app.inject({
        method: 'POST',
        url: '/v1/run/stream',
        payload: {},
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('validation_error');
    });
  });

  describe('run status and stop', () => {
    it('reports a finished run', async () => {
      harness = await createTestApp(
        [calls(['execute_command', { asset_name: 'db-1', command: 'uptime' }]), final('db-1 is up.')],
        { executor: new FakeExecutor(() => ({ output: 'up 9 days', exitCode: 0 })) },
      );

      const run = await harness.app.inject({
        method: 'POST',
        url: '/v1/run',
        payload: { instruction: 'uptime on db-1', asset_names: ['db-1'] },
      });
      const { trace_id: traceId, session_id: sessionId } = JSON.parse(run.body);

      const response = await harness.app.inject({ method: 'GET', url: `/v1/run/status/${traceId}` });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body).toMatchObject({
        trace_id: traceId,
        status: 'completed',
        instruction: 'uptime on db-1',
        asset_names: ['db-1'],
        session_id: sessionId,
        reply: 'db-1 is up.',
        error: null,
        rounds: 2,
      });
      expect(body.commands).toMatchObject([{ asset_name: 'db-1', command: 'uptime', result: 'up 9 days' }]);
      expect(body.finished_at).not.toBeNull();
    });

    it('returns 404 for an unknown run', async () => {
      harness = await createTestApp();

      const status = await harness.app.inject({ method: 'GET', url: '/v1/run/status/nope' });
      const stop = await harness.app.inject({ method: 'POST', url: '/v1/run/stop', payload: { trace_id: 'nope' } });

      expect(status.statusCode).toBe(404);
      expect(stop.statusCode).toBe(404);
    });

    it('returns the stop notice from a stopped synchronous run', async () => {
      let stopRun = () => {};
      harness = await createTestApp([
        () => {
          stopRun();
          return final('never sent');
        },
      ]);
      const runs = harness.runs;
      const start = vi.spyOn(runs, 'start');
      stopRun = () => {
        runs.stop(String(start.mock.calls[0][0]));
      };

      const response = await harness.app.inject({ method: 'POST', url: '/v1/run', payload: { instruction: 'noop' } });

      expect(JSON.parse(response.body)).toMatchObject({
        status: 'cancelled',
        reply: 'Stopped at user request before any command ran.',
        commands: [],
      });
    });

    it('returns 409 when stopping a finished run', async () => {
      harness = await createTestApp([final('done')]);

      const run = await harness.app.inject({ method: 'POST', url: '/v1/run', payload: { instruction: 'noop' } });
      const { trace_id: traceId } = JSON.parse(run.body);

      const stop = await harness.app.inject({ method: 'POST', url: '/v1/run/stop', payload: { trace_id: traceId } });
      expect(stop.statusCode).toBe(409);
      expect(JSON.parse(stop.body).error).toBe('conflict');
    });
  });

  describe('health', () => {
    it('reports status and model configuration', async () => {
      harness = await createTestApp([], { modelConfigured: false });

      const response = await harness.app.inject({ method: 'GET', url: '/v1/health' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toMatchObject({ status: 'ok', version: '1.0.0', model_configured: false });
    });

    it('redirects the legacy health path', async () => {
      harness = await createTestApp();

      const response = await harness.app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(301);
      expect(response.headers.location).toBe('/v1/health');
    });
  });
});
