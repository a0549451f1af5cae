import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ErrorCode, NotFoundError, ValidationError } from '@tasklane/core';
import { loadDefaultFlow, loadFlowsFromDir, parseFlowYaml } from './loader.js';
import { validateFlow } from './validation.js';
import { FlowRegistry, createFlowRegistry } from './registry.js';
import type { FlowDefinition } from './types.js';

function makeFlow(overrides: Partial<FlowDefinition> = {}): FlowDefinition {
  return {
    name: 'x',
    cluster: 'default',
    description: '',
    states: ['incoming', 'claimed', 'done'],
    transitions: [
      { from: 'incoming', to: 'claimed', guards: [], effects: [], conditions: [] },
      { from: 'claimed', to: 'done', guards: [], effects: [], conditions: [] },
    ],
    ...overrides,
  };
}

describe('flow loading', () => {
  it('should load the bundled default flow', () => {
    const flow = loadDefaultFlow();

    expect(flow.name).toBe('default');
    expect(flow.cluster).toBe('default');
    expect(flow.states).toEqual([
      'incoming',
      'claimed',
      'provisional',
      'needs_continuation',
      'blocked',
      'backlog',
      'done',
      'failed',
    ]);
    expect(flow.transitions).toHaveLength(13);
    expect(validateFlow(flow)).toEqual([]);

    const accept = flow.transitions.find((t) => t.from === 'provisional' && t.to === 'done');
    expect(accept).toEqual({
      from: 'provisional',
      to: 'done',
      agent: undefined,
      guards: ['checks_passed'],
      effects: ['merge_pr', 'unblock_dependents', 'record_history', 'notify'],
      conditions: [{ name: 'review', type: 'agent', script: undefined, agent: 'reviewer', onFail: 'incoming' }],
    });
  });

  it('should derive states from transitions when none are listed', () => {
    const flow = parseFlowYaml(`
name: quick
cluster: team-x
transitions:
  "incoming -> claimed":
    agent: implementer
  "claimed -> done":
    conditions:
      - name: tests
        type: script
        script: unit
        on_fail: incoming
`);
    expect(flow.cluster).toBe('team-x');
    expect(flow.states).toEqual(['incoming', 'claimed', 'done']);
    expect(flow.transitions[0]).toMatchObject({ from: 'incoming', to: 'claimed', agent: 'implementer', guards: [] });
  });

  it('should default the cluster', () => {
    expect(parseFlowYaml('name: bare\ntransitions:\n  "incoming -> done": {}').cluster).toBe('default');
  });

  it('should reject a malformed transition key', () => {
    expect(() => parseFlowYaml('name: bad\ntransitions:\n  "incoming claimed": {}')).toThrow(
      "Invalid flow definition (inline): invalid transition key 'incoming claimed' (must be 'state1 -> state2')"
    );
  });

  it('should reject an unknown guard', () => {
    const yaml = 'name: bad\ntransitions:\n  "incoming -> claimed":\n    guards: [magic]';
    try {
      parseFlowYaml(yaml, 'bad.yaml');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        code: ErrorCode.INVALID_FLOW,
        message: "Invalid flow definition (bad.yaml): transition 'incoming -> claimed' has unknown guard 'magic'",
      });
    }
  });

  it('should reject a condition with an unknown type', () => {
    const yaml = `
name: bad
transitions:
  "incoming -> done":
    conditions:
      - name: vibe
        type: feeling
`;
    expect(() => parseFlowYaml(yaml)).toThrow(
      "Invalid flow definition (inline): transition 'incoming -> done' conditions[0].type must be script, agent, or manual"
    );
  });

  it('should reject invalid YAML', () => {
    expect(() => parseFlowYaml('name: [unterminated')).toThrow(/^Invalid flow definition \(inline\): invalid YAML/);
  });

  it('should require a name', () => {
    expect(() => parseFlowYaml('transitions: {}')).toThrow('Invalid flow definition (inline): name is required');
  });

  describe('loadFlowsFromDir', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tasklane-flows-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should load yaml files sorted by name and ignore other files', () => {
      fs.writeFileSync(path.join(dir, 'b.yaml'), 'name: second\ntransitions:\n  "incoming -> done": {}\n');
      fs.writeFileSync(path.join(dir, 'a.yml'), 'name: first\ntransitions:\n  "incoming -> done": {}\n');
      fs.writeFileSync(path.join(dir, 'notes.txt'), 'not a flow');

      expect(loadFlowsFromDir(dir).map((f) => f.name)).toEqual(['first', 'second']);
    });

    it('should return nothing for a missing directory', () => {
      expect(loadFlowsFromDir(path.join(dir, 'missing'))).toEqual([]);
    });

    it('should feed a registry alongside the default flow', () => {
      fs.writeFileSync(
        path.join(dir, 'team.yaml'),
        'name: default\ncluster: team-x\ntransitions:\n  "incoming -> done": {}\n'
      );
      const registry = createFlowRegistry({ flowsDir: dir });

      expect(registry.list()).toHaveLength(2);
      expect(registry.canTransition('default', 'team-x', 'incoming', 'done')).toBe(true);
      expect(registry.canTransition('default', 'default', 'incoming', 'done')).toBe(false);
    });
  });
});

describe('validateFlow', () => {
  it('should accept a minimal flow', () => {
    expect(validateFlow(makeFlow())).toEqual([]);
  });

  it('should refuse transitions out of terminal states and unreachable states', () => {
    const flow = makeFlow({
      states: ['incoming', 'done', 'review'],
      transitions: [
        { from: 'incoming', to: 'done', guards: [], effects: [], conditions: [] },
        { from: 'done', to: 'incoming', guards: [], effects: [], conditions: [] },
      ],
    });

    expect(validateFlow(flow)).toEqual([
      "Flow 'x' (cluster default) transition 'done -> incoming': 'done' is terminal",
      "Flow 'x' (cluster default) has unreachable states: review",
    ]);
  });

  it('should report unknown states, duplicates and bad on_fail targets', () => {
    const flow = makeFlow({
      transitions: [
        { from: 'incoming', to: 'claimed', guards: [], effects: [], conditions: [] },
        { from: 'incoming', to: 'claimed', guards: [], effects: [], conditions: [] },
        {
          from: 'claimed',
          to: 'review',
          guards: [],
          effects: [],
          conditions: [{ name: 'gate', type: 'manual', onFail: 'nowhere' }],
        },
        { from: 'claimed', to: 'done', guards: [], effects: [], conditions: [] },
      ],
    });

    expect(validateFlow(flow)).toEqual([
      "Flow 'x' (cluster default) defines 'incoming -> claimed' more than once",
      "Flow 'x' (cluster default) transition 'claimed -> review': unknown state 'review'",
      "Flow 'x' (cluster default) transition 'claimed -> review' condition 'gate': on_fail state 'nowhere' is not a valid state",
    ]);
  });

  it('should require the incoming state', () => {
    const flow = makeFlow({ states: ['backlog', 'done'], transitions: [{ from: 'backlog', to: 'done', guards: [], effects: [], conditions: [] }] });
    expect(validateFlow(flow)).toEqual(["Flow 'x' (cluster default) must include the 'incoming' state"]);
  });

  it('should count on_fail targets as reachable', () => {
    const flow = makeFlow({
      states: ['incoming', 'claimed', 'rework', 'done'],
      transitions: [
        { from: 'incoming', to: 'claimed', guards: [], effects: [], conditions: [] },
        {
          from: 'claimed',
          to: 'done',
          guards: [],
          effects: [],
          conditions: [{ name: 'tests', type: 'script', script: 'unit', onFail: 'rework' }],
        },
        { from: 'rework', to: 'claimed', guards: [], effects: [], conditions: [] },
      ],
    });
    expect(validateFlow(flow)).toEqual([]);
  });
});

describe('FlowRegistry', () => {
  let registry: FlowRegistry;

  beforeEach(() => {
    registry = createFlowRegistry();
  });

  it('should prefer a cluster flow and fall back to the default cluster', () => {
    const custom = makeFlow({ name: 'default', cluster: 'team-x' });
    registry.register(custom);

    expect(registry.get('default', 'team-x')).toBe(custom);
    expect(registry.get('default', 'team-y')?.cluster).toBe('default');
    expect(registry.canTransition('default', 'team-x', 'incoming', 'backlog')).toBe(false);
    expect(registry.canTransition('default', 'team-y', 'incoming', 'backlog')).toBe(true);
  });

  it('should never return another cluster flow', () => {
    registry.register(makeFlow({ name: 'special', cluster: 'team-x' }));
    expect(registry.get('special', 'team-y')).toBeUndefined();
    try {
      registry.require('special', 'team-y');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ code: ErrorCode.FLOW_NOT_FOUND, message: 'Flow not found: special (cluster team-y)' });
    }
  });

  it('should refuse to register an invalid flow', () => {
    const broken = makeFlow({ states: ['claimed', 'done'] });
    expect(() => registry.register(broken)).toThrow(ValidationError);
    expect(registry.get('x', 'default')).toBeUndefined();
  });

  it('should list transitions out of a queue', () => {
    const targets = registry.transitionsFrom('default', 'default', 'claimed').map((t) => t.to);
    expect(targets).toEqual(['provisional', 'needs_continuation', 'incoming', 'failed']);
  });
});
