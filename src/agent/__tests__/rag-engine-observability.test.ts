/**
 * RAG Engine Observability Tests
 *
 * Checks the spans, attributes and events the engine emits through a
 * recording tracer, and that telemetry never changes the outcome.
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { RAGEngine, createRAGEngine } from '../rag-engine.js';
import { GenerationError } from '../../errors/index.js';
import { NOOP_TRACE } from '../../observability/index.js';
import type { TraceHandle, Tracer } from '../../observability/index.js';
import { silentLogger } from '../../utils/logger.js';
import {
  createRecord,
  createTestConfig,
  FakeGenerationCollaborator,
  FakeSearchCollaborator,
  RecordingTracer,
} from '../../test-utils/index.js';

const policyRecord = createRecord({
  content: 'The deductible is $500.',
  title: 'Policy',
  source: 'policy.pdf',
  page_number: 3,
});

describe('RAGEngine observability', () => {
  let tracer: RecordingTracer;
  let search: FakeSearchCollaborator;

  beforeEach(() => {
    tracer = new RecordingTracer();
    search = new FakeSearchCollaborator([policyRecord]);
  });

  function createEngine(generation: FakeGenerationCollaborator, sampleRate = 1): RAGEngine {
    return new RAGEngine({
      config: createTestConfig({ observability: { sample_rate: sampleRate } }),
      search,
      generation,
      tracer,
      logger: silentLogger,
    });
  }

  describe('chat', () => {
    it('opens one workflow trace with three child spans', async () => {
      await createEngine(new FakeGenerationCollaborator()).chat('What is the deductible?', [], {
        sessionId: 'session-1',
      });

      expect(tracer.spans.map((s) => [s.name, s.kind, s.parent])).toEqual([
        ['rag_chat_workflow', 'trace', undefined],
        ['search_documents', 'span', 'rag_chat_workflow'],
        ['format_sources', 'span', 'rag_chat_workflow'],
        ['generate_response', 'generation', 'rag_chat_workflow'],
      ]);
      expect(tracer.spans.every((s) => s.ended)).toBe(true);
    });

    it('emits the workflow step events in order', async () => {
      await createEngine(new FakeGenerationCollaborator()).chat('What is the deductible?');

      expect(tracer.eventNames('rag_chat_workflow')).toEqual([
        'rag_workflow_started',
        'step_1_search_started',
        'step_1_search_completed',
        'step_2_format_started',
        'step_2_format_completed',
        'step_3_build_messages_started',
        'step_3_build_messages_completed',
        'step_4_generate_started',
        'step_4_generate_completed',
        'rag_workflow_completed',
      ]);
    });

    it('records workflow attributes', async () => {
      await createEngine(new FakeGenerationCollaborator()).chat('What is the deductible?');

      const workflow = tracer.find('rag_chat_workflow');
      expect(workflow.attributes).toMatchObject({
        'rag.query': 'What is the deductible?',
        'rag.workflow_type': 'complete',
        'rag.streaming': false,
        'rag.conversation_turns': 0,
        'rag.documents_retrieved': 1,
        'rag.status': 'success',
        'rag.total_tokens': 132,
        'rag.input.context': 'policy.pdf#page=3: The deductible is $500.',
      });
    });

    it('records search attributes', async () => {
      await createEngine(new FakeGenerationCollaborator()).chat('What is the deductible?');

      const span = tracer.find('search_documents');
      expect(span.attributes).toMatchObject({
        'search.query': 'What is the deductible?',
        'search.top_k': 5,
        'search.use_semantic_ranker': true,
        'search.index_name': 'documents',
        'search.type': 'hybrid',
        'search.documents_found': 1,
        'search.top_score': 0.82,
        'search.sources': 'policy.pdf',
        'search.doc_1.source': 'policy.pdf',
        'search.doc_1.title': 'Policy',
        'search.doc_1.page': 3,
      });
      expect(tracer.eventNames('search_documents')).toEqual(['search_started', 'search_completed']);
    });

    it('records generation request and response attributes', async () => {
      await createEngine(new FakeGenerationCollaborator()).chat('What is the deductible?');

      const span = tracer.find('generate_response');
      expect(span.model).toBe('gpt-4o-mini');
      expect(span.attributes).toMatchObject({
        'gen_ai.system': 'azure_openai',
        'gen_ai.request.model': 'gpt-4o-mini',
        'gen_ai.request.max_tokens': 2048,
        'gen_ai.request.streaming': false,
        'gen_ai.request.message_count': 2,
        'gen_ai.request.message_1.role': 'user',
        'gen_ai.request.message_1.content': 'What is the deductible?',
        'gen_ai.response.total_tokens': 132,
        'gen_ai.response.finish_reason': 'stop',
      });
    });

    it('marks no_sources when nothing is retrieved', async () => {
      search = new FakeSearchCollaborator([]);
      await createEngine(new FakeGenerationCollaborator()).chat('q');

      expect(tracer.find('format_sources').attributes).toEqual({
        'format.document_count': 0,
        'format.result': 'no_sources',
      });
    });

    it('marks the trace and the failing span on error', async () => {
      const engine = createEngine(
        new FakeGenerationCollaborator({ error: new Error('deployment missing') })
      );

      await expect(engine.chat('q')).rejects.toBeInstanceOf(GenerationError);

      const workflow = tracer.find('rag_chat_workflow');
      expect(workflow.attributes['rag.status']).toBe('error');
      expect(workflow.exceptions).toHaveLength(1);
      expect(workflow.ended).toBe(true);

      const generation = tracer.find('generate_response');
      expect(generation.attributes['status']).toBe('error');
      expect(generation.ended).toBe(true);
    });

    it('records nothing when sampled out', async () => {
      const result = await createEngine(new FakeGenerationCollaborator(), 0).chat('q');

      expect(result.answer).not.toBe('');
      expect(tracer.spans).toEqual([]);
    });
  });

  describe('chatStream', () => {
    it('records the chunk count and completion events', async () => {
      const engine = createEngine(new FakeGenerationCollaborator({ fragments: ['a', 'b', 'c'] }));

      for await (const event of engine.chatStream('q')) {
        expect(event.type).toBeDefined();
      }

      const workflow = tracer.find('rag_chat_stream_workflow');
      expect(workflow.attributes).toMatchObject({
        'rag.workflow_type': 'streaming',
        'rag.streaming': true,
        'rag.stream_chunk_count': 3,
        'rag.answer_length': 3,
        'rag.status': 'success',
      });
      expect(tracer.eventNames('rag_chat_stream_workflow').slice(-4)).toEqual([
        'step_3_build_messages_completed',
        'step_4_stream_started',
        'step_4_stream_completed',
        'rag_stream_workflow_completed',
      ]);
      expect(workflow.ended).toBe(true);
    });

    it('marks the trace cancelled when the consumer stops early', async () => {
      const engine = createEngine(new FakeGenerationCollaborator({ fragments: ['a', 'b'] }));

      for await (const event of engine.chatStream('q')) {
        expect(event).toEqual({ type: 'fragment', text: 'a' });
        break;
      }

      const workflow = tracer.find('rag_chat_stream_workflow');
      expect(workflow.attributes['rag.status']).toBe('cancelled');
      expect(workflow.ended).toBe(true);
    });

    it('marks the trace failed on a mid-stream error', async () => {
      const engine = createEngine(
        new FakeGenerationCollaborator({ fragments: ['x'], failAfter: 1 })
      );

      await expect(
        (async () => {
          for await (const event of engine.chatStream('q')) {
            expect(event.type).toBe('fragment');
          }
        })()
      ).rejects.toBeInstanceOf(GenerationError);

      const workflow = tracer.find('rag_chat_stream_workflow');
      expect(workflow.attributes['rag.status']).toBe('error');
      expect(workflow.exceptions).toHaveLength(1);
    });
  });

  describe('failing tracers', () => {
    function tracerHanding(handle: TraceHandle): Tracer {
      return {
        trace: () => handle,
        flush: async () => {},
        shutdown: async () => {},
        isRemote: true,
      };
    }

    const endFails: TraceHandle = {
      ...NOOP_TRACE,
      recordException: () => {
        throw new Error('record failed');
      },
      end: () => {
        throw new Error('end failed');
      },
    };

    it('keeps answering when trace() throws', async () => {
      const broken: Tracer = {
        trace: () => {
          throw new Error('exporter down');
        },
        flush: async () => {},
        shutdown: async () => {},
        isRemote: true,
      };
      const engine = new RAGEngine({
        config: createTestConfig(),
        search,
        generation: new FakeGenerationCollaborator(),
        tracer: broken,
        logger: silentLogger,
      });

      const result = await engine.chat('q');

      expect(result.formattedSources).toBe('policy.pdf#page=3: The deductible is $500.');
    });

    it('returns the answer when ending the trace throws', async () => {
      const engine = createRAGEngine(createTestConfig(), {
        search,
        generation: new FakeGenerationCollaborator(),
        tracer: tracerHanding(endFails),
        logger: silentLogger,
      });

      const result = await engine.chat('q');

      expect(result.answer).toBe('The deductible is $500 [policy.pdf#page=3].');
    });

    it('surfaces the generation error, not the telemetry one', async () => {
      const engine = new RAGEngine({
        config: createTestConfig(),
        search,
        generation: new FakeGenerationCollaborator({ error: new Error('quota exceeded') }),
        tracer: tracerHanding(endFails),
        logger: silentLogger,
      });

      const failure = engine.chat('q');

      await expect(failure).rejects.toBeInstanceOf(GenerationError);
      await expect(failure).rejects.toThrow('quota exceeded');
    });

    it('finishes a stream when ending the trace throws', async () => {
      const engine = new RAGEngine({
        config: createTestConfig(),
        search,
        generation: new FakeGenerationCollaborator({ fragments: ['a', 'b'] }),
        tracer: tracerHanding(endFails),
        logger: silentLogger,
      });

      const types: string[] = [];
      for await (const event of engine.chatStream('q')) {
        types.push(event.type);
      }

      expect(types).toEqual(['fragment', 'fragment', 'done']);
    });
  });
});
