/**
 * Span Lifecycle Tests
 */

import { describe, it, expect } from 'vitest';
import { setTimeout as delay } from 'timers/promises';
import { GraphIntegrityError, TraceGraph } from '@tracegraph/protocol';
import { getCurrentNode } from '../context.js';
import type { Diagnostic } from '../diagnostics.js';
import { Span } from '../span.js';
import { Tracer, type TracerOptions } from '../tracer.js';

function createTracer(options: TracerOptions = {}) {
  const diagnostics: Diagnostic[] = [];
  const tracer = new Tracer(options);
  tracer.on('diagnostic', (diagnostic: Diagnostic) => diagnostics.push(diagnostic));
  return { tracer, diagnostics };
}

class Widget {
  size = 3;
}

describe('Span', () => {
  describe('Construction', () => {
    it('should draw sequence numbers at construction, not entry', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');

      await scope.run(root => {
        const first = root.node('first');
        const second = root.node('second');
        second.run(() => undefined);
        first.run(() => undefined);

        expect(first.getNode().sequence_number).toBe(1);
        expect(second.getNode().sequence_number).toBe(2);
      });
    });

    it('should not touch the graph before entry', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');

      await scope.run(root => {
        const pending = root.node('pending');
        expect(pending.status).toBe('pending');
        expect(scope.graph.nodes.has(pending.id)).toBe(false);
        pending.run(() => undefined);
      });
    });

    it('should parent to the ambient node of the same trace', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');

      await scope.run(root => {
        const child = new Span({ trace: scope.graph, name: 'child' });
        expect(child.getNode().parent_id).toBe(root.id);
        expect(child.getNode().depth).toBe(1);
        child.run(() => undefined);
      });
    });

    it('should ignore an ambient node from another trace', async () => {
      const { tracer } = createTracer();
      const other = new TraceGraph({ name: 'other' });

      await tracer.trace('run').run(() => {
        const span = new Span({ trace: other, name: 'detached' });
        expect(span.getNode().parent_id).toBeNull();
        expect(span.getNode().depth).toBe(0);
      });
    });
  });

  describe('Lifecycle', () => {
    it('should complete a span and add the causal edge', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');

      await scope.run(root => root.node('search', 'tool_call').run(() => 'done'));

      const [child] = scope.graph.children(scope.root.id);
      expect(child.name).toBe('search');
      expect(child.node_type).toBe('tool_call');
      expect(child.status).toBe('completed');
      expect(child.start_time).not.toBeNull();
      expect(child.end_time).not.toBeNull();
      expect(scope.graph.edges).toEqual([
        { source_id: scope.root.id, target_id: child.id, edge_type: 'caused_by', label: '', metadata: {} },
      ]);
    });

    it('should record a failure and re-throw the original error', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');
      const failure = new TypeError('bad input');

      const outcome = scope.run(root => {
        root.node('parse').run(() => {
          throw failure;
        });
      });

      await expect(outcome).rejects.toBe(failure);
      const [node] = scope.graph.children(scope.root.id);
      expect(node.status).toBe('failed');
      expect(node.error).toBe('bad input');
      expect(node.error_type).toBe('TypeError');
      expect(node.error_traceback).toContain('TypeError: bad input');
      expect(scope.root.status).toBe('failed');
    });

    it('should omit the traceback below the full capture level', async () => {
      const { tracer } = createTracer({ captureLevel: 'standard' });
      const scope = tracer.trace('run');

      await expect(
        scope.run(() => {
          throw new RangeError('out of range');
        })
      ).rejects.toThrow('out of range');

      expect(scope.root.getNode().error_type).toBe('RangeError');
      expect(scope.root.getNode().error_traceback).toBeNull();
    });

    it('should describe thrown non-errors', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');

      await expect(
        scope.run(() => {
          throw 'plain failure';
        })
      ).rejects.toBe('plain failure');

      expect(scope.root.getNode().error).toBe('plain failure');
      expect(scope.root.getNode().error_type).toBe('string');
    });

    it('should keep bookkeeping across suspension points', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');

      await scope.run(async root => {
        await root.node('slow').runAsync(async span => {
          await delay(5);
          expect(getCurrentNode()).toBe(span.getNode());
          span.output({ ok: true });
        });
        expect(getCurrentNode()).toBe(root.getNode());
      });

      const [slow] = scope.graph.children(scope.root.id);
      expect(slow.status).toBe('completed');
      expect(slow.output_data).toEqual({ ok: true });
    });

    it('should leave the caller on its own node after awaiting a child', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('awaited');

      await scope.run(async root => {
        async function step(): Promise<void> {
          await new Span({ trace: scope.graph, name: 'step' }).runAsync(async () => {
            await Promise.resolve();
          });
        }

        await step();

        expect(getCurrentNode()).toBe(root.getNode());
        const next = new Span({ trace: scope.graph, name: 'next' });
        expect(next.getNode().parent_id).toBe(root.id);
        expect(next.getNode().depth).toBe(1);
        next.run(() => undefined);
      });
    });

    it('should keep concurrent branches as siblings', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('fan-out');

      await scope.run(async () => {
        const branch = async (name: string, wait: number): Promise<void> => {
          const span = new Span({ trace: scope.graph, name });
          await span.runAsync(async () => {
            await delay(wait);
            new Span({ trace: scope.graph, name: `${name}.leaf` }).run(() => undefined);
          });
        };

        await Promise.all([branch('a', 15), branch('b', 5), branch('c', 10)]);
      });

      const branches = scope.graph.children(scope.root.id);
      expect(branches.map(node => node.name)).toEqual(['a', 'b', 'c']);
      expect(branches.map(node => node.depth)).toEqual([1, 1, 1]);
      for (const node of branches) {
        const leaves = scope.graph.children(node.id);
        expect(leaves.map(leaf => [leaf.name, leaf.depth])).toEqual([[`${node.name}.leaf`, 2]]);
      }
    });

    it('should run a span only once', async () => {
      const { tracer, diagnostics } = createTracer();
      const scope = tracer.trace('run');

      await scope.run(root => {
        const step = root.node('step');
        step.run(() => undefined);
        const endTime = step.getNode().end_time;

        expect(step.run(() => 'again')).toBe('again');
        expect(step.status).toBe('completed');
        expect(step.getNode().end_time).toBe(endTime);
      });

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0].code).toBe('bookkeeping_failed');
      expect(diagnostics[0].message).toBe("Span 'step' was already started");
      expect(scope.graph.nodes.size).toBe(2);
    });
  });

  describe('Status', () => {
    it('should keep a status cancelled before entry', async () => {
      const { tracer } = createTracer();

      await tracer.trace('run').run(root => {
        const span = root.node('skipped').setStatus('cancelled');
        span.run(() => undefined);

        expect(span.status).toBe('cancelled');
      });
    });

    it('should allow cancelling a running span', async () => {
      const { tracer } = createTracer();

      await tracer.trace('run').run(root => {
        const span = root.node('work');
        span.run(s => {
          s.setStatus('cancelled');
        });
        expect(span.status).toBe('cancelled');
      });
    });

    it('should keep an explicitly failed status on a clean exit', async () => {
      const { tracer } = createTracer();

      await tracer.trace('run').run(root => {
        const span = root.node('check');
        span.run(s => {
          s.setStatus('failed');
        });
        expect(span.status).toBe('failed');
      });
    });

    it('should reject transitions out of a terminal status', async () => {
      const { tracer, diagnostics } = createTracer();

      await tracer.trace('run').run(root => {
        const span = root.node('done');
        span.run(() => undefined);
        span.setStatus('running');

        expect(span.status).toBe('completed');
      });

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0].code).toBe('status_transition_rejected');
      expect(diagnostics[0].message).toBe("Rejected status change completed -> running for node 'done'");
    });

    it('should record an error without throwing', async () => {
      const { tracer } = createTracer();

      await tracer.trace('run').run(root => {
        const attempt = root.node('attempt');
        attempt.run(s => {
          s.recordError(new Error('retry me'));
        });

        expect(attempt.status).toBe('failed');
        expect(attempt.getNode().error).toBe('retry me');
      });
    });
  });

  describe('Data', () => {
    it('should merge input, output and metadata', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');

      await scope.run(root => {
        root.input({ query: 'weather' }).input({ days: 3 });
        root.output({ answer: 'sunny' });
        root.metadata({ model: 'test-model' });
      });

      const node = scope.root.getNode();
      expect(node.input_data).toEqual({ query: 'weather', days: 3 });
      expect(node.output_data).toEqual({ answer: 'sunny' });
      expect(node.metadata).toEqual({ model: 'test-model' });
    });

    it('should tag values that cannot be represented', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');

      await scope.run(root => {
        root.input({ widget: new Widget(), count: 10n });
      });

      expect(scope.root.getNode().input_data).toEqual({
        widget: 'Widget { size: 3 } [NON-SERIALIZABLE]',
        count: '10n [NON-SERIALIZABLE]',
      });
    });

    it('should truncate long input strings', async () => {
      const { tracer } = createTracer({ maxInputSize: 6 });
      const scope = tracer.trace('run');

      await scope.run(root => {
        root.input({ prompt: 'abcdefghij' });
      });

      const stored = scope.root.getNode().input_data.prompt;
      expect(stored).toBe('abcdef... [TRUNCATED: original_size=10]');
    });

    it('should keep annotations in order', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');

      await scope.run(root => {
        root.annotate('first').annotate('second').annotate('first');
      });

      expect(scope.root.getNode().annotations).toEqual(['first', 'second', 'first']);
    });

    it('should keep partial data on a failed span', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');

      await expect(
        scope.run(root => {
          root.input({ step: 1 });
          throw new Error('halfway');
        })
      ).rejects.toThrow('halfway');

      expect(scope.root.getNode().input_data).toEqual({ step: 1 });
    });
  });

  describe('Links', () => {
    it('should add explicit edges alongside the implicit ones', async () => {
      const { tracer } = createTracer();
      const scope = tracer.trace('run');

      await scope.run(root => {
        const first = root.node('first_attempt');
        const retry = root.node('retry');
        const fallback = root.node('fallback');
        first.run(() => undefined);
        retry.run(() => undefined);
        fallback.run(() => undefined);

        retry.link(first, 'retry_of');
        fallback.link(retry, 'fallback_of', { label: 'gave up' });
      });

      const implicit = scope.graph.edges.filter(edge => edge.edge_type === 'caused_by');
      const explicit = scope.graph.edges.filter(edge => edge.edge_type !== 'caused_by');
      const names = (id: string) => scope.graph.getNode(id)?.name;

      expect(implicit).toHaveLength(3);
      expect(explicit.map(edge => [names(edge.source_id), names(edge.target_id), edge.edge_type, edge.label])).toEqual([
        ['retry', 'first_attempt', 'retry_of', ''],
        ['fallback', 'retry', 'fallback_of', 'gave up'],
      ]);
    });

    it('should refuse to link a span that was never entered', async () => {
      const { tracer } = createTracer();

      await tracer.trace('run').run(root => {
        const pending = root.node('pending');
        expect(() => root.link(pending)).toThrow(GraphIntegrityError);
        pending.run(() => undefined);
      });
    });
  });
});
