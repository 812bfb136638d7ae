/**
 * Tests for the chat REPL session
 */

import { describe, it, expect } from 'vitest';

import { ChatSession, findCommand } from '../chat.js';
import { RAGEngine } from '../../../agent/rag-engine.js';
import { silentLogger } from '../../../utils/logger.js';
import {
  createRecord,
  createTestConfig,
  FakeGenerationCollaborator,
  FakeSearchCollaborator,
} from '../../../test-utils/index.js';
import { createMockContext, type MockContext } from './helpers.js';

interface Harness {
  session: ChatSession;
  ctx: MockContext;
  generation: FakeGenerationCollaborator;
  output: string[];
}

function setup(generation = new FakeGenerationCollaborator({ fragments: ['It is ', '$500.'] })): Harness {
  const engine = new RAGEngine({
    config: createTestConfig(),
    search: new FakeSearchCollaborator([createRecord()]),
    generation,
    logger: silentLogger,
  });
  const ctx = createMockContext();
  const output: string[] = [];
  const session = new ChatSession(engine, ctx, {}, (text) => {
    output.push(text);
  });
  return { session, ctx, generation, output };
}

describe('findCommand', () => {
  it.each([
    ['/help', 'help'],
    ['/?', 'help'],
    ['/CLEAR', 'clear'],
    ['/s', 'sources'],
    ['exit', 'exit'],
    ['quit', 'exit'],
    ['/q', 'exit'],
  ])('maps %s to %s', (input, name) => {
    expect(findCommand(input)?.name).toBe(name);
  });

  it('treats other text as a question', () => {
    expect(findCommand('exit strategy?')).toBeUndefined();
    expect(findCommand('/unknown')).toBeUndefined();
  });
});

describe('ChatSession', () => {
  it('streams the answer and records the turn', async () => {
    const { session, output } = setup();

    await expect(session.handleLine('What is the deductible?')).resolves.toBe(true);

    expect(output).toEqual(['It is ', '$500.', '\n']);
    expect(session.history).toEqual([
      { role: 'user', content: 'What is the deductible?' },
      { role: 'assistant', content: 'It is $500.' },
    ]);
    expect(session.lastDocuments).toHaveLength(1);
  });

  it('sends earlier turns as history', async () => {
    const { session, generation } = setup();

    await session.handleLine('First?');
    await session.handleLine('Second?');

    const messages = generation.requests[1]?.messages ?? [];
    expect(messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(messages[3]?.content).toBe('Second?');
  });

  it('clears the history', async () => {
    const { session } = setup();
    await session.handleLine('First?');

    await session.handleLine('/clear');

    expect(session.history).toEqual([]);
    expect(session.lastDocuments).toEqual([]);
  });

  it('shows the sources of the last answer', async () => {
    const { session, ctx } = setup();
    await session.handleLine('First?');

    await session.handleLine('/sources');

    expect(ctx.logs.at(-1)).toBe('1. Policy\n   📄 policy.pdf (Page 3)');
  });

  it('ends on exit', async () => {
    const { session } = setup();

    await expect(session.handleLine('exit')).resolves.toBe(false);
  });

  it('reports a failed question and keeps the history unchanged', async () => {
    const { session, ctx } = setup(
      new FakeGenerationCollaborator({ error: new Error('throttled') })
    );

    await expect(session.handleLine('q')).resolves.toBe(true);

    expect(ctx.errors).toEqual(['throttled']);
    expect(session.history).toEqual([]);
  });

  it('warns about unknown commands', async () => {
    const { session, ctx } = setup();

    await session.handleLine('/focus docs');

    expect(ctx.warnings).toEqual(['Unknown command: /focus. Type /help for commands.']);
  });

  it('ignores blank lines', async () => {
    const { session, generation } = setup();

    await expect(session.handleLine('   ')).resolves.toBe(true);
    expect(generation.requests).toHaveLength(0);
  });
});
