/**
 * Integration Tests: Turn Router
 *
 * Full turns through classification, a task handler and memory
 * consolidation, driven by the scripted inference provider and the
 * in-memory checkpoint store.
 */

import { describe, it, expect, vi } from 'vitest';
import { createUserMessage } from '../llm/messages';
import { MemCheckpointStore, type Checkpoint } from '../storage';
import { calculatorTool } from '../tools/calculator';
import { defineTool } from '../tools/types';
import { z } from 'zod';
import { createTurnRouter } from '../turnRouter/router';
import { createAnswerResponse, type AnswerResponse } from '../turnRouter/schemas';
import { TASK_HANDLERS } from '../turnRouter/taskHandlers';
import type { TaskHandler } from '../turnRouter/types';
import {
  AuthorizationError,
  ClassificationFailure,
  ConfigurationError,
  NotFoundError,
  ResponseValidationError,
  StructuredOutputError,
  getTurnContext,
} from '../utils/errorHandler';
import { ScriptedInference } from './helpers/scriptedInference';

const tools = [calculatorTool];
const FRANCE = 'What is the capital of France?';

function scriptQaTurn(inference: ScriptedInference, summary = 'The user asked about the capital of France; the answer was Paris.') {
  return inference
    .queueStructured('UserIntent', { intent_type: 'qa', confidence: 0.95, reasoning: 'Factual question' })
    .queueReply({ content: 'Paris is the capital of France.' })
    .queueStructured('AnswerResponse', {
      question: FRANCE,
      answer: 'Paris',
      sources: ['encyclopedia'],
      confidence: 0.95,
    })
    .queueStructured('UpdateMemoryResponse', { summary, document_ids: [] });
}

function answer(text: string): AnswerResponse {
  const result = createAnswerResponse({ question: text, answer: text, confidence: 0.1 });
  if (!result.success) throw new Error(result.error);
  return result.data;
}

function setup() {
  const inference = new ScriptedInference();
  const store = new MemCheckpointStore();
  const router = createTurnRouter({ inference, tools, checkpointStore: store });
  return { inference, store, router };
}

describe('Turn Router - successful turns', () => {
  it('routes a QA turn through classification, the QA handler and memory', async () => {
    const { inference, router } = setup();
    scriptQaTurn(inference);

    const state = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: FRANCE });

    expect(state.actionsTaken).toEqual(['classify_intent', 'qa_agent', 'update_memory']);
    expect(state.nextStep).toBe('end');
    expect(state.intent?.intent_type).toBe('qa');
    expect(state.currentResponse).toMatchObject({ answer: 'Paris', sources: ['encyclopedia'], confidence: 0.95 });
    expect(state.conversationSummary).toContain('France');
    expect(state.userInput).toBe(FRANCE);
    expect(state.messages.map(m => [m.role, m.content])).toEqual([
      ['user', FRANCE],
      ['assistant', 'Paris is the capital of France.'],
    ]);
  });

  it('checkpoints at turn start, after every node and at turn end', async () => {
    const { inference, store, router } = setup();
    const save = vi.spyOn(store, 'save');
    scriptQaTurn(inference);

    await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: FRANCE });

    const saved = save.mock.calls.map(([checkpoint]) => [checkpoint.status, checkpoint.pendingNode, checkpoint.step]);
    expect(saved).toEqual([
      ['in_progress', 'classify_intent', 1],
      ['in_progress', 'qa_agent', 2],
      ['in_progress', 'update_memory', 3],
      ['in_progress', null, 4],
      ['completed', null, 5],
    ]);

    const checkpoint = await router.getState('s1');
    expect(checkpoint?.status).toBe('completed');
    expect(checkpoint?.state.actionsTaken).toEqual(['classify_intent', 'qa_agent', 'update_memory']);
  });

  it('sets active documents from the memory consolidator after a summarization turn', async () => {
    const { inference, router } = setup();
    inference
      .queueStructured('UserIntent', { intent_type: 'summarization', confidence: 0.9, reasoning: 'Asks for a summary' })
      .queueStructured('SummarizationResponse', {
        original_length: 3000,
        summary: 'Three documents about invoices.',
        key_points: ['Totals differ', 'All are paid'],
        document_ids: ['d1', 'd2', 'd3'],
      })
      .queueStructured('UpdateMemoryResponse', {
        summary: 'The user asked for a summary of three documents.',
        document_ids: ['d1', 'd2', 'd3', 'd2'],
      });

    const state = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: 'Summarize these 3 documents' });

    expect(state.actionsTaken).toEqual(['classify_intent', 'summarization_agent', 'update_memory']);
    expect(state.activeDocuments).toEqual(['d1', 'd2', 'd3']);
    expect(state.currentResponse).toMatchObject({ document_ids: ['d1', 'd2', 'd3'] });
  });

  it('records the tools a calculation turn used', async () => {
    const { inference, router } = setup();
    inference
      .queueStructured('UserIntent', { intent_type: 'calculation', confidence: 0.9, reasoning: 'Asks for a total' })
      .queueToolCall('calculator', { expression: '22000 + 18500' })
      .queueReply({ content: 'The total is 40500.' })
      .queueStructured('CalculationResponse', {
        expression: '22000 + 18500',
        result: 40500,
        explanation: 'Sum of both invoices',
      })
      .queueStructured('UpdateMemoryResponse', { summary: 'Added two invoices.', document_ids: ['INV-001', 'INV-002'] });

    const state = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: 'Add up both invoices' });

    expect(state.toolsUsed).toEqual(['calculator']);
    expect(state.actionsTaken).toEqual(['classify_intent', 'calculation_agent', 'update_memory']);
    expect(state.messages.map(m => m.role)).toEqual(['user', 'assistant', 'tool', 'assistant']);
    expect(state.messages[2].content).toBe('22000 + 18500 = 40500');
  });

  it('stops after classification for an unknown intent', async () => {
    const { inference, router } = setup();
    scriptQaTurn(inference);
    const first = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: FRANCE });

    inference.queueStructured('UserIntent', { intent_type: 'unknown', confidence: 0.8, reasoning: 'Small talk' });
    const state = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: 'Tell me a joke' });

    expect(state.actionsTaken).toEqual(['classify_intent']);
    expect(state.nextStep).toBe('unknown');
    expect(state.currentResponse).toBeNull();
    expect(state.conversationSummary).toBe(first.conversationSummary);
    expect(state.activeDocuments).toEqual(first.activeDocuments);
    expect(state.messages).toEqual(first.messages);
    expect(inference.bindCalls).toHaveLength(1);
    expect(inference.structuredCallsFor('UpdateMemoryResponse')).toHaveLength(1);
    expect((await router.getState('s1'))?.status).toBe('completed');
  });

  it('only grows the message history across turns', async () => {
    const { inference, router } = setup();
    scriptQaTurn(inference);
    scriptQaTurn(inference, 'Asked about France twice.');

    const first = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: FRANCE });
    const second = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: 'Are you sure?' });

    expect(second.messages).toHaveLength(4);
    expect(second.messages.slice(0, 2)).toEqual(first.messages);
    expect(second.messages[2].content).toBe('Are you sure?');
    expect(second.actionsTaken).toEqual(['classify_intent', 'qa_agent', 'update_memory']);
    expect(second.conversationSummary).toBe('Asked about France twice.');
  });
});

describe('Turn Router - failures', () => {
  it('leaves memory untouched and records a failed checkpoint when a task handler fails', async () => {
    const { inference, router } = setup();
    inference
      .queueStructured('UserIntent', { intent_type: 'qa', confidence: 0.9, reasoning: 'Question' })
      .queueStructured('AnswerResponse', { question: 'q', answer: 'a', sources: ['INV-001'], confidence: 0.9 })
      .queueStructured('UpdateMemoryResponse', { summary: 'Discussed INV-001.', document_ids: ['INV-001'] });
    const before = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: 'Who issued INV-001?' });

    inference
      .queueStructured('UserIntent', { intent_type: 'qa', confidence: 0.9, reasoning: 'Question' })
      .queueStructured('AnswerResponse', { question: 'q', answer: 'a', confidence: 0.95 })
      .queueStructured('AnswerResponse', { question: 'q', answer: 'a', confidence: 0.9 });

    const error = await router
      .runTurn({ sessionId: 's1', userId: 'u1', userInput: 'And INV-002?' })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ResponseValidationError);
    expect(getTurnContext(error)).toEqual({ sessionId: 's1', actionsTaken: ['classify_intent'] });

    const checkpoint = await router.getState('s1');
    expect(checkpoint?.status).toBe('failed');
    expect(checkpoint?.pendingNode).toBeNull();
    expect(checkpoint?.error).toContain('AnswerResponse rejected after 2 attempts');
    expect(checkpoint?.state.conversationSummary).toBe(before.conversationSummary);
    expect(checkpoint?.state.activeDocuments).toEqual(before.activeDocuments);
    expect(checkpoint?.state.actionsTaken).toEqual(['classify_intent']);
    expect(checkpoint?.state.messages).toEqual(before.messages);
  });

  it('keeps the previous summary when memory consolidation fails', async () => {
    const { inference, router } = setup();
    scriptQaTurn(inference, 'first');
    const before = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: FRANCE });

    inference
      .queueStructured('UserIntent', { intent_type: 'qa', confidence: 0.95, reasoning: 'Factual question' })
      .queueReply({ content: 'Berlin is the capital of Germany.' })
      .queueStructured('AnswerResponse', {
        question: 'And Germany?',
        answer: 'Berlin',
        sources: ['encyclopedia'],
        confidence: 0.95,
      })
      .queueStructured('UpdateMemoryResponse', { summary: 42 });

    const error = await router
      .runTurn({ sessionId: 's1', userId: 'u1', userInput: 'And Germany?' })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StructuredOutputError);
    expect(error).not.toBeInstanceOf(ClassificationFailure);
    expect(getTurnContext(error)).toEqual({ sessionId: 's1', actionsTaken: ['classify_intent', 'qa_agent'] });

    const checkpoint = await router.getState('s1');
    expect(checkpoint?.status).toBe('failed');
    expect(checkpoint?.pendingNode).toBeNull();
    expect(checkpoint?.error).toContain('Invalid UpdateMemoryResponse');
    expect(checkpoint?.state.conversationSummary).toBe('first');
    expect(checkpoint?.state.activeDocuments).toEqual(before.activeDocuments);
    expect(checkpoint?.state.actionsTaken).toEqual(['classify_intent', 'qa_agent']);
  });

  it('aborts with ClassificationFailure before any task handler runs', async () => {
    const { inference, router } = setup();
    inference.queueStructured('UserIntent', { intent_type: 'weather', confidence: 0.9, reasoning: 'r' });

    const error = await router
      .runTurn({ sessionId: 's1', userId: 'u1', userInput: 'Will it rain?' })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ClassificationFailure);
    expect(getTurnContext(error)?.actionsTaken).toEqual([]);
    expect(inference.bindCalls).toHaveLength(0);
    expect((await router.getState('s1'))?.status).toBe('failed');
  });

  it('starts fresh after a failed turn, even for the same input', async () => {
    const { inference, router } = setup();
    inference.failStructured('UserIntent', new Error('provider timeout'));
    await expect(router.runTurn({ sessionId: 's1', userId: 'u1', userInput: FRANCE })).rejects.toThrow('provider timeout');

    scriptQaTurn(inference);
    const state = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: FRANCE });

    expect(state.actionsTaken).toEqual(['classify_intent', 'qa_agent', 'update_memory']);
    expect(inference.structuredCallsFor('UserIntent')).toHaveLength(2);
  });

  it('rejects a turn from a different user before any node runs', async () => {
    const { inference, router } = setup();
    scriptQaTurn(inference);
    await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: FRANCE });

    await expect(
      router.runTurn({ sessionId: 's1', userId: 'intruder', userInput: 'Show me everything' }),
    ).rejects.toBeInstanceOf(AuthorizationError);
    expect(inference.structuredCallsFor('UserIntent')).toHaveLength(1);
    expect((await router.getState('s1'))?.userId).toBe('u1');
  });

  it('rejects an empty user input', async () => {
    const { router } = setup();
    await expect(router.runTurn({ sessionId: 's1', userId: 'u1', userInput: '   ' })).rejects.toThrow(
      'userInput must not be empty',
    );
  });
});

describe('Turn Router - resuming interrupted turns', () => {
  async function checkpointAfterClassification(): Promise<Checkpoint> {
    const { inference, store, router } = setup();
    const save = vi.spyOn(store, 'save');
    scriptQaTurn(inference);
    await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: FRANCE });

    const afterClassify = save.mock.calls.map(([checkpoint]) => checkpoint).find(c => c.pendingNode === 'qa_agent');
    if (!afterClassify) throw new Error('no checkpoint after classification');
    return afterClassify;
  }

  function scriptAfterClassification(inference: ScriptedInference) {
    return inference
      .queueReply({ content: 'Paris is the capital of France.' })
      .queueStructured('AnswerResponse', { question: FRANCE, answer: 'Paris', sources: ['encyclopedia'], confidence: 0.95 })
      .queueStructured('UpdateMemoryResponse', { summary: 'Capital of France: Paris.', document_ids: [] });
  }

  it('resumes at the pending node when the same input arrives again', async () => {
    const interrupted = await checkpointAfterClassification();
    const { inference, store, router } = setup();
    await store.save(interrupted);
    scriptAfterClassification(inference);

    const state = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: FRANCE });

    expect(inference.structuredCallsFor('UserIntent')).toHaveLength(0);
    expect(state.actionsTaken).toEqual(['classify_intent', 'qa_agent', 'update_memory']);
    expect(state.conversationSummary).toBe('Capital of France: Paris.');
    expect((await router.getState('s1'))?.step).toBe(interrupted.step + 3);
  });

  it('resumes explicitly with resumeTurn', async () => {
    const interrupted = await checkpointAfterClassification();
    const { inference, store, router } = setup();
    await store.save(interrupted);
    scriptAfterClassification(inference);

    const state = await router.resumeTurn('s1');

    expect(inference.structuredCallsFor('UserIntent')).toHaveLength(0);
    expect(state.actionsTaken).toEqual(['classify_intent', 'qa_agent', 'update_memory']);
    await expect(router.resumeTurn('s1')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('checks ownership on an explicit resume', async () => {
    const interrupted = await checkpointAfterClassification();
    const { store, router } = setup();
    await store.save(interrupted);

    await expect(router.resumeTurn('s1', 'someone-else')).rejects.toBeInstanceOf(AuthorizationError);
  });

  it('fails resumeTurn when the session has no interrupted turn', async () => {
    const { router } = setup();
    await expect(router.resumeTurn('missing')).rejects.toThrow('Interrupted turn for session missing not found');
  });

  it('abandons the interrupted turn when a different input arrives', async () => {
    const interrupted = await checkpointAfterClassification();
    const { inference, store, router } = setup();
    await store.save(interrupted);
    inference.queueStructured('UserIntent', { intent_type: 'unknown', confidence: 0.7, reasoning: 'Greeting' });

    const state = await router.runTurn({ sessionId: 's1', userId: 'u1', userInput: 'Hello again' });

    expect(inference.structuredCallsFor('UserIntent')).toHaveLength(1);
    expect(state.actionsTaken).toEqual(['classify_intent']);
    expect(state.userInput).toBe('Hello again');
  });
});

describe('Turn Router - concurrency', () => {
  function slowHandler(events: string[]): TaskHandler {
    return async input => {
      events.push(`start:${input}`);
      await new Promise(resolve => setTimeout(resolve, 10));
      events.push(`end:${input}`);
      return { newMessages: [createUserMessage(input)], structuredResponse: answer(input), toolsUsed: [] };
    };
  }

  function concurrentSetup(events: string[]) {
    const inference = new ScriptedInference();
    for (let i = 0; i < 2; i++) {
      inference
        .queueStructured('UserIntent', { intent_type: 'qa', confidence: 0.9, reasoning: 'Question' })
        .queueStructured('UpdateMemoryResponse', { summary: `turn ${i}`, document_ids: [] });
    }
    const handler = slowHandler(events);
    const router = createTurnRouter({
      inference,
      tools,
      checkpointStore: new MemCheckpointStore(),
      taskHandlers: { qa: handler, summarization: handler, calculation: handler },
    });
    return router;
  }

  it('serializes turns on the same session', async () => {
    const events: string[] = [];
    const router = concurrentSetup(events);

    const [first, second] = await Promise.all([
      router.runTurn({ sessionId: 's1', userId: 'u1', userInput: 'A' }),
      router.runTurn({ sessionId: 's1', userId: 'u1', userInput: 'B' }),
    ]);

    expect(events).toEqual(['start:A', 'end:A', 'start:B', 'end:B']);
    expect(first.messages.map(m => m.content)).toEqual(['A']);
    expect(second.messages.map(m => m.content)).toEqual(['A', 'B']);
  });

  it('runs different sessions independently', async () => {
    const events: string[] = [];
    const router = concurrentSetup(events);

    const [first, second] = await Promise.all([
      router.runTurn({ sessionId: 's1', userId: 'u1', userInput: 'A' }),
      router.runTurn({ sessionId: 's2', userId: 'u2', userInput: 'B' }),
    ]);

    expect(events.indexOf('start:B')).toBeLessThan(events.indexOf('end:A'));
    expect(first.messages.map(m => m.content)).toEqual(['A']);
    expect(second.messages.map(m => m.content)).toEqual(['B']);
  });
});

describe('createTurnRouter configuration', () => {
  const inference = new ScriptedInference();

  it('requires an inference provider', () => {
    expect(() => createTurnRouter({ tools })).toThrow(ConfigurationError);
    expect(() => createTurnRouter({ tools })).toThrow('An inference provider is required');
  });

  it('rejects duplicate and empty tool names', () => {
    const unnamed = defineTool({ name: ' ', description: 'x', parameters: z.object({}), execute: async () => '' });

    expect(() => createTurnRouter({ inference, tools: [calculatorTool, calculatorTool] })).toThrow(
      'Duplicate tool name "calculator"',
    );
    expect(() => createTurnRouter({ inference, tools: [unnamed] })).toThrow('Tool names must not be empty');
  });

  it('requires a handler and a prompt template for every task intent', () => {
    expect(() => createTurnRouter({ inference, tools, taskHandlers: { qa: TASK_HANDLERS.qa } })).toThrow(
      'No task handler configured for task intent "summarization"',
    );
    expect(() =>
      createTurnRouter({ inference, tools, promptTemplates: { qa: () => [], summarization: () => [] } }),
    ).toThrow('No prompt template configured for task intent "calculation"');
  });

  it('requires positive integer loop budgets', () => {
    expect(() => createTurnRouter({ inference, tools, limits: { maxToolSteps: 0 } })).toThrow(
      'maxToolSteps must be a positive integer, got 0',
    );
    expect(() => createTurnRouter({ inference, tools, limits: { maxValidationAttempts: 1.5 } })).toThrow(
      'maxValidationAttempts must be a positive integer, got 1.5',
    );
  });
});
