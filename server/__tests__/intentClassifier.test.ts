import { describe, it, expect } from 'vitest';
import { createAssistantMessage, createUserMessage } from '../llm/messages';
import { classifyIntent } from '../turnRouter/intentClassifier';
import { ClassificationFailure, StructuredOutputError } from '../utils/errorHandler';
import { ScriptedInference } from './helpers/scriptedInference';

describe('classifyIntent', () => {
  it('returns a frozen UserIntent', async () => {
    const inference = new ScriptedInference().queueStructured('UserIntent', {
      intent_type: 'qa',
      confidence: 0.95,
      reasoning: 'A factual question',
    });

    const intent = await classifyIntent(inference, 'What is the capital of France?', []);

    expect(intent).toEqual({ intent_type: 'qa', confidence: 0.95, reasoning: 'A factual question' });
    expect(Object.isFrozen(intent)).toBe(true);
  });

  it('renders history as role-prefixed lines in the prompt', async () => {
    const inference = new ScriptedInference().queueStructured('UserIntent', {
      intent_type: 'calculation',
      confidence: 0.8,
      reasoning: 'Follow-up asks for a total',
    });
    const history = [createUserMessage('Show me invoice INV-001'), createAssistantMessage('It totals $22,000.')];

    await classifyIntent(inference, 'And with INV-002?', history, { model: 'test-model' });

    const [call] = inference.structuredCalls;
    expect(call.model).toBe('test-model');
    expect(call.schema.name).toBe('UserIntent');
    expect(call.messages[1].content).toBe(
      'Conversation history:\nuser: Show me invoice INV-001\nassistant: It totals $22,000.\n\nUser message:\n"And with INV-002?"',
    );
  });

  it('says so when there is no history', async () => {
    const inference = new ScriptedInference().queueStructured('UserIntent', {
      intent_type: 'unknown',
      confidence: 0.6,
      reasoning: 'Greeting',
    });

    await classifyIntent(inference, 'hello', []);

    expect(inference.structuredCalls[0].messages[1].content).toContain('No previous conversation.');
  });

  it('fails with ClassificationFailure on a non-conforming value', async () => {
    const inference = new ScriptedInference().queueStructured('UserIntent', {
      intent_type: 'smalltalk',
      confidence: 0.9,
      reasoning: 'r',
    });

    const error = await classifyIntent(inference, 'hi', []).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ClassificationFailure);
    expect(error).toBeInstanceOf(StructuredOutputError);
    if (!(error instanceof ClassificationFailure)) return;
    expect(error.code).toBe('classification_failure');
    expect(error.schemaName).toBe('UserIntent');
    expect(error.issues[0].path).toEqual(['intent_type']);
  });

  it('wraps provider parse failures in ClassificationFailure', async () => {
    const cause = new StructuredOutputError('UserIntent', 'Model returned invalid JSON for UserIntent');
    const inference = new ScriptedInference().failStructured('UserIntent', cause);

    const error = await classifyIntent(inference, 'hi', []).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ClassificationFailure);
    if (!(error instanceof ClassificationFailure)) return;
    expect(error.message).toBe('Intent classification failed: Model returned invalid JSON for UserIntent');
    expect(error.cause).toBe(cause);
  });
});
