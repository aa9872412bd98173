import { describe, it, expect } from 'vitest';
import { Orchestrator, stepLimitReply } from '../orchestrator.js';
import { SYSTEM_PROMPT } from '../prompts.js';
import type { ModelClient } from '../model-client.js';
import type { OrchestratorConfig, RunEvent, Turn } from '../types.js';
import { InMemoryAssetDirectory } from '../../assets/in-memory-asset-directory.js';
import { ToolRegistry } from '../../tools/registry.js';
import { createOpsToolRegistry } from '../../tools/index.js';
import type { CommandResult } from '../../remote/ssh-executor.js';
import type { Asset } from '../../assets/types.js';
import { AppError, ModelEndpointError, ToolConfigurationError, TransportError } from '../../../utils/errors.js';
import { FakeExecutor, ScriptedModelClient, calls, final } from './fakes.js';

const DF_OUTPUT = [
  'Filesystem      Size  Used Avail Use% Mounted on',
  '/dev/sda1        40G   17G   23G  42% /',
].join('\n');

type Responder = (asset: Asset, command: string) => CommandResult | Error;

function setup(
  steps: ConstructorParameters<typeof ScriptedModelClient>[0],
  options: { repeat?: ConstructorParameters<typeof ScriptedModelClient>[1]; responder?: Responder; config?: Partial<OrchestratorConfig> } = {},
) {
  const assets = new InMemoryAssetDirectory([
    { name: 'web-1', host: '10.0.0.11', username: 'deploy', password: 'test-secret' },
    { name: 'db-1', host: '10.0.0.12', username: 'root', privateKeyPath: '~/.ssh/id_test' },
  ]);
  const executor = new FakeExecutor(options.responder ?? ((_asset: Asset, command: string) => ({ output: command === 'df -h' ? DF_OUTPUT : '', exitCode: 0 })));
  const modelClient = new ScriptedModelClient(steps, options.repeat);
  const orchestrator = new Orchestrator({
    config: { maxRounds: 5, toolResultMaxChars: 1000, ...options.config },
    modelClient,
    registry: createOpsToolRegistry({ uploadEnabled: false, uploadDir: './uploads' }),
    assets,
    executor,
  });
  const events: RunEvent[] = [];
  const sink = (event: RunEvent) => {
    events.push(event);
  };
  return { orchestrator, modelClient, executor, events, sink };
}

function lastTurn(conversation: readonly Turn[]): Turn {
  return conversation[conversation.length - 1];
}

/** Every assistant turn with tool calls is followed by one tool turn per call, in order. */
function expectPaired(conversation: readonly Turn[]): void {
  conversation.forEach((turn, index) => {
    if (turn.role !== 'assistant' || !turn.toolCalls) return;
    turn.toolCalls.forEach((call, offset) => {
      const answer = conversation[index + 1 + offset];
      expect(answer.role).toBe('tool');
      if (answer.role === 'tool') expect(answer.toolCallId).toBe(call.id);
    });
  });
}

describe('Orchestrator', () => {
  describe('construction', () => {
    it('should reject a non-positive round budget', () => {
      expect(() => setup([], { config: { maxRounds: 0 } })).toThrow(RangeError);
    });

    it('should reject an empty tool registry', () => {
      expect(
        () =>
          new Orchestrator({
            config: { maxRounds: 3, toolResultMaxChars: 100 },
            modelClient: new ScriptedModelClient([]),
            registry: new ToolRegistry(),
            assets: new InMemoryAssetDirectory(),
            executor: new FakeExecutor(),
          }),
      ).toThrow(ToolConfigurationError);
    });
  });

  it('should list assets and answer from the result', async () => {
    const { orchestrator, modelClient, executor, events, sink } = setup([
      calls(['list_assets', {}]),
      final('Configured servers: db-1, web-1'),
    ]);

    const outcome = await orchestrator.runStream({ instruction: 'list all servers' }, sink);

    expect(outcome.status).toBe('completed');
    expect(outcome.reply).toBe('Configured servers: db-1, web-1');
    expect(outcome.commands).toEqual([]);
    expect(outcome.rounds).toBe(2);
    expect(executor.runs).toEqual([]);
    expect(events).toEqual([{ type: 'reply', reply: 'Configured servers: db-1, web-1' }]);
    expect(lastTurn(modelClient.conversations[1])).toMatchObject({
      role: 'tool',
      toolName: 'list_assets',
      content: '- db-1: root@10.0.0.12:22\n- web-1: deploy@10.0.0.11:22',
    });
    expect(modelClient.toolNames[0]).toEqual(['list_assets', 'execute_command']);
  });

  it('should run a command and stream its events in order', async () => {
    const { orchestrator, modelClient, executor, events, sink } = setup([
      calls(['execute_command', { asset_name: 'web-1', command: 'df -h' }]),
      final('| Mount | Use% |\n|---|---|\n| / | 42% |'),
    ]);

    const outcome = await orchestrator.runStream({ instruction: 'check disk usage on web-1' }, sink);

    expect(executor.runs).toEqual([{ asset: 'web-1', command: 'df -h' }]);
    expect(outcome.commands).toHaveLength(1);
    expect(outcome.commands[0]).toMatchObject({ assetName: 'web-1', command: 'df -h', result: DF_OUTPUT });
    expect(events).toEqual([
      { type: 'command_start', assetName: 'web-1', command: 'df -h' },
      { type: 'command_result', assetName: 'web-1', command: 'df -h', result: DF_OUTPUT },
      { type: 'reply', reply: '| Mount | Use% |\n|---|---|\n| / | 42% |' },
    ]);
    expect(lastTurn(modelClient.conversations[1])).toMatchObject({ role: 'tool', content: DF_OUTPUT, assetName: 'web-1' });
    expectPaired(outcome.conversation);
  });

  it('should tell the model about an unknown asset without running anything', async () => {
    const { orchestrator, modelClient, executor, sink } = setup([
      calls(['execute_command', { asset_name: 'web-9', command: 'uptime' }]),
      final('There is no asset named web-9.'),
    ]);

    const outcome = await orchestrator.runStream({ instruction: 'uptime on web-9' }, sink);

    expect(outcome.status).toBe('completed');
    expect(outcome.commands).toEqual([]);
    expect(executor.runs).toEqual([]);
    expect(lastTurn(modelClient.conversations[1])).toMatchObject({
      role: 'tool',
      content: 'Asset "web-9" not found. Call list_assets to see the configured assets.',
    });
  });

  it('should stop at the round budget with a partial summary', async () => {
    const { orchestrator, modelClient, events, sink } = setup([], {
      repeat: () => calls(['execute_command', { asset_name: 'web-1', command: 'uptime' }]),
      config: { maxRounds: 3 },
    });

    const outcome = await orchestrator.runStream({ instruction: 'keep checking' }, sink);

    expect(outcome.status).toBe('step_limit');
    expect(outcome.rounds).toBe(3);
    expect(modelClient.asks).toBe(3);
    expect(outcome.commands).toHaveLength(3);
    expect(outcome.reply).toBe(
      'Step limit reached (3 rounds) before the task finished. Partial results are listed below.\n' +
        '- [web-1] uptime\n- [web-1] uptime\n- [web-1] uptime',
    );
    expect(events[events.length - 1]).toEqual({ type: 'reply', reply: outcome.reply });
    expect(events.filter(e => e.type === 'command_start')).toHaveLength(3);
    expectPaired(outcome.conversation);
  });

  it('should dispatch several calls of one round in order', async () => {
    const { orchestrator, events, sink } = setup([
      calls(
        ['execute_command', { asset_name: 'web-1', command: 'hostname' }],
        ['execute_command', { asset_name: 'db-1', command: 'hostname' }],
      ),
      final('done'),
    ], { responder: asset => ({ output: asset.name, exitCode: 0 }) });

    const outcome = await orchestrator.runStream({ instruction: 'hostnames' }, sink);

    expect(events.map(e => e.type)).toEqual(['command_start', 'command_result', 'command_start', 'command_result', 'reply']);
    expect(outcome.commands.map(c => c.result)).toEqual(['web-1', 'db-1']);
    expectPaired(outcome.conversation);
  });

  it('should feed argument errors and unknown tools back to the model', async () => {
    const { orchestrator, modelClient, sink } = setup([
      calls(['execute_command', { asset_name: 'web-1' }], ['reboot_all', {}]),
      final('Could not proceed.'),
    ]);

    const outcome = await orchestrator.runStream({ instruction: 'do things' }, sink);
    const turns = modelClient.conversations[1];

    expect(outcome.status).toBe('completed');
    expect(turns[turns.length - 2]).toMatchObject({
      role: 'tool',
      content: 'Invalid arguments for execute_command: command: Required',
    });
    expect(turns[turns.length - 1]).toMatchObject({
      role: 'tool',
      content: 'Unknown tool "reboot_all". Available tools: list_assets, execute_command',
    });
  });

  it('should continue after a transport failure', async () => {
    const { orchestrator, modelClient, events, sink } = setup(
      [calls(['execute_command', { asset_name: 'db-1', command: 'uptime' }]), final('db-1 is unreachable.')],
      { responder: () => new TransportError('ssh: connect to host 10.0.0.12 port 22: Connection refused') },
    );

    const outcome = await orchestrator.runStream({ instruction: 'uptime on db-1' }, sink);

    expect(outcome.status).toBe('completed');
    expect(events[1]).toEqual({
      type: 'command_result',
      assetName: 'db-1',
      command: 'uptime',
      result: 'SSH error: ssh: connect to host 10.0.0.12 port 22: Connection refused',
    });
    expect(modelClient.asks).toBe(2);
  });

  it('should truncate long output for the model but keep it in the record', async () => {
    const { orchestrator, modelClient, sink } = setup(
      [calls(['execute_command', { asset_name: 'web-1', command: 'journalctl' }]), final('ok')],
      { responder: () => ({ output: 'x'.repeat(120), exitCode: 0 }), config: { toolResultMaxChars: 50 } },
    );

    const outcome = await orchestrator.runStream({ instruction: 'logs' }, sink);

    expect(outcome.commands[0].result).toHaveLength(120);
    expect(lastTurn(modelClient.conversations[1]).content).toBe(
      'x'.repeat(50) +
        '\n\n[Output truncated: showing the first 50 of 120 characters. Decide the next step from what is shown.]',
    );
  });

  it('should restrict the run to the allowed assets', async () => {
    const { orchestrator, modelClient, executor, sink } = setup([
      calls(['list_assets', {}], ['execute_command', { asset_name: 'web-1', command: 'uptime' }]),
      final('Only db-1 is available.'),
    ]);

    await orchestrator.runStream({ instruction: 'uptime everywhere', allowedAssetNames: ['db-1'] }, sink);
    const turns = modelClient.conversations[1];

    expect(turns[1]).toEqual({
      role: 'system',
      content: 'This request is restricted to the following assets: db-1. Do not list, target or mention any other asset.',
    });
    expect(turns[turns.length - 2]).toMatchObject({ content: '- db-1: root@10.0.0.12:22' });
    expect(turns[turns.length - 1]).toMatchObject({
      content: 'Asset "web-1" is not allowed for this request. Allowed assets: db-1',
    });
    expect(executor.runs).toEqual([]);
  });

  it('should seed prior history without its system turns', async () => {
    const { orchestrator, modelClient, sink } = setup([final('Still fine.')]);

    await orchestrator.runStream(
      {
        instruction: 'and now?',
        history: [
          { role: 'system', content: 'old prompt' },
          { role: 'user', content: 'how is web-1?' },
          { role: 'assistant', content: 'web-1 is fine.' },
        ],
      },
      sink,
    );

    expect(modelClient.conversations[0]).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'how is web-1?' },
      { role: 'assistant', content: 'web-1 is fine.' },
      { role: 'user', content: 'and now?' },
    ]);
  });

  it('should use a configured system prompt', async () => {
    const { orchestrator, modelClient, sink } = setup([final('ok')], { config: { systemPrompt: 'Be brief.' } });
    await orchestrator.runStream({ instruction: 'hi' }, sink);

    expect(modelClient.conversations[0][0]).toEqual({ role: 'system', content: 'Be brief.' });
  });

  it('should end with a single error event when the model fails', async () => {
    const { orchestrator, events, sink } = setup([new ModelEndpointError('Model endpoint error (500): boom', 500)]);

    const outcome = await orchestrator.runStream({ instruction: 'check' }, sink);

    expect(outcome.status).toBe('error');
    expect(outcome.error).toBe('Model endpoint error (500): boom');
    expect(events).toEqual([{ type: 'error', message: 'Model endpoint error (500): boom' }]);
  });

  it('should keep going when the sink throws', async () => {
    const { orchestrator } = setup([
      calls(['execute_command', { asset_name: 'web-1', command: 'df -h' }]),
      final('done'),
    ]);

    const outcome = await orchestrator.runStream({ instruction: 'check' }, () => {
      throw new Error('client went away');
    });

    expect(outcome.status).toBe('completed');
    expect(outcome.commands).toHaveLength(1);
  });

  it('should reject an empty instruction', async () => {
    const { orchestrator, sink } = setup([]);

    await expect(orchestrator.runStream({ instruction: '   ' }, sink)).rejects.toBeInstanceOf(AppError);
  });

  it('should treat an empty asset selection as no restriction', async () => {
    const { orchestrator, modelClient, executor, sink } = setup([
      calls(['execute_command', { asset_name: 'web-1', command: 'uptime' }]),
      final('web-1 is up.'),
    ]);

    const outcome = await orchestrator.runStream({ instruction: 'uptime on web-1', allowedAssetNames: [] }, sink);

    expect(outcome.status).toBe('completed');
    expect(executor.runs).toEqual([{ asset: 'web-1', command: 'uptime' }]);
    expect(modelClient.conversations[0].filter(turn => turn.role === 'system')).toHaveLength(1);
  });

  it('should send a call without an asset to the only selected asset', async () => {
    const { orchestrator, executor, sink } = setup([
      calls(['execute_command', { command: 'df -h' }]),
      final('42% used.'),
    ]);

    const outcome = await orchestrator.runStream({ instruction: 'disk usage', allowedAssetNames: ['db-1'] }, sink);

    expect(executor.runs).toEqual([{ asset: 'db-1', command: 'df -h' }]);
    expect(outcome.commands[0]).toMatchObject({ assetName: 'db-1', command: 'df -h' });
  });

  it('should stream the text that comes with a tool call as a model reply', async () => {
    const narrated = calls(['execute_command', { asset_name: 'web-1', command: 'uptime' }]);
    narrated.text = 'Checking the load on web-1 first.';
    const { orchestrator, events, sink } = setup([narrated, final('Load is normal.')], {
      responder: () => ({ output: 'up 3 days', exitCode: 0 }),
    });

    await orchestrator.runStream({ instruction: 'how loaded is web-1?' }, sink);

    expect(events).toEqual([
      { type: 'model_reply', round: 1, content: 'Checking the load on web-1 first.' },
      { type: 'command_start', assetName: 'web-1', command: 'uptime' },
      { type: 'command_result', assetName: 'web-1', command: 'uptime', result: 'up 3 days' },
      { type: 'reply', reply: 'Load is normal.' },
    ]);
  });

  it('should keep concurrent runs apart', async () => {
    const assets = new InMemoryAssetDirectory([
      { name: 'web-1', host: '10.0.0.11', username: 'deploy', password: 'test-secret' },
      { name: 'db-1', host: '10.0.0.12', username: 'root', privateKeyPath: '~/.ssh/id_test' },
    ]);
    const executor = new FakeExecutor((_asset, command) => ({ output: command.replace('echo ', ''), exitCode: 0 }));
    const targets: Record<string, string> = { alpha: 'web-1', beta: 'db-1' };
    // Answers from the conversation alone, yielding between rounds so the two runs interleave
    const modelClient: ModelClient = {
      mode: 'native',
      ask: async conversation => {
        await new Promise(resolve => setTimeout(resolve, 5));
        const instruction = lastTurn(conversation.filter(turn => turn.role === 'user')).content;
        if (!conversation.some(turn => turn.role === 'tool')) {
          return calls(['execute_command', { asset_name: targets[instruction], command: `echo ${instruction}` }]);
        }
        return final(`done ${instruction}`);
      },
    };
    const orchestrator = new Orchestrator({
      config: { maxRounds: 5, toolResultMaxChars: 1000 },
      modelClient,
      registry: createOpsToolRegistry({ uploadEnabled: false, uploadDir: './uploads' }),
      assets,
      executor,
    });
    const alphaEvents: RunEvent[] = [];
    const betaEvents: RunEvent[] = [];

    const [alpha, beta] = await Promise.all([
      orchestrator.runStream({ instruction: 'alpha' }, event => alphaEvents.push(event)),
      orchestrator.runStream({ instruction: 'beta' }, event => betaEvents.push(event)),
    ]);

    expect(executor.runs).toHaveLength(2);
    expect(alpha.commands.map(c => [c.assetName, c.command, c.result])).toEqual([['web-1', 'echo alpha', 'alpha']]);
    expect(beta.commands.map(c => [c.assetName, c.command, c.result])).toEqual([['db-1', 'echo beta', 'beta']]);
    expect(alpha.reply).toBe('done alpha');
    expect(beta.reply).toBe('done beta');
    expect(alpha.conversation.filter(turn => turn.role === 'user' || turn.role === 'tool').map(turn => turn.content)).toEqual([
      'alpha',
      'alpha',
    ]);
    expect(beta.conversation.filter(turn => turn.role === 'user' || turn.role === 'tool').map(turn => turn.content)).toEqual([
      'beta',
      'beta',
    ]);
    expect(alphaEvents[alphaEvents.length - 1]).toEqual({ type: 'reply', reply: 'done alpha' });
    expect(betaEvents[betaEvents.length - 1]).toEqual({ type: 'reply', reply: 'done beta' });
    expectPaired(alpha.conversation);
    expectPaired(beta.conversation);
  });

  describe('cancellation', () => {
    it('should not ask the model once aborted', async () => {
      const { orchestrator, modelClient, events, sink } = setup([final('never')]);
      const controller = new AbortController();
      controller.abort();

      const outcome = await orchestrator.runStream({ instruction: 'check', signal: controller.signal }, sink);

      expect(outcome.status).toBe('cancelled');
      expect(outcome.reply).toBe('Stopped at user request before any command ran.');
      expect(modelClient.asks).toBe(0);
      expect(events).toEqual([]);
    });

    it('should stop between rounds and emit nothing after the abort', async () => {
      const controller = new AbortController();
      const { orchestrator, modelClient, events, sink } = setup(
        [calls(['execute_command', { asset_name: 'web-1', command: 'uptime' }]), final('never')],
        {
          responder: () => {
            controller.abort();
            return { output: 'up 3 days', exitCode: 0 };
          },
        },
      );

      const outcome = await orchestrator.runStream({ instruction: 'check', signal: controller.signal }, sink);

      expect(outcome.status).toBe('cancelled');
      expect(modelClient.asks).toBe(1);
      expect(outcome.commands).toHaveLength(1);
      expect(outcome.reply).toBe('Stopped at user request. Commands that ran before the stop:\n- [web-1] uptime');
      expect(events).toEqual([{ type: 'command_start', assetName: 'web-1', command: 'uptime' }]);
    });

    it('should answer the remaining calls of the round without running them', async () => {
      const controller = new AbortController();
      const { orchestrator, executor, sink } = setup(
        [calls(
          ['execute_command', { asset_name: 'web-1', command: 'uptime' }],
          ['execute_command', { asset_name: 'db-1', command: 'uptime' }],
        )],
        {
          responder: () => {
            controller.abort();
            return { output: '', exitCode: 0 };
          },
        },
      );

      const outcome = await orchestrator.runStream({ instruction: 'check', signal: controller.signal }, sink);

      expect(executor.runs).toEqual([{ asset: 'web-1', command: 'uptime' }]);
      expect(lastTurn(outcome.conversation)).toMatchObject({ role: 'tool', content: 'Cancelled before execution' });
      expectPaired(outcome.conversation);
    });
  });

  describe('run', () => {
    it('should return the outcome of a completed run', async () => {
      const { orchestrator } = setup([final('All good.')]);
      const outcome = await orchestrator.run({ instruction: 'status' });

      expect(outcome.status).toBe('completed');
      expect(outcome.reply).toBe('All good.');
    });

    it('should throw when the model endpoint fails', async () => {
      const { orchestrator } = setup([new ModelEndpointError('Model endpoint error (503): overloaded', 503)]);

      await expect(orchestrator.run({ instruction: 'status' })).rejects.toThrow(ModelEndpointError);
    });
  });
});

describe('stepLimitReply', () => {
  it('should say so when nothing ran', () => {
    expect(stepLimitReply(2, [])).toBe(
      'Step limit reached (2 rounds) before the task finished. Partial results are listed below.',
    );
  });
});
