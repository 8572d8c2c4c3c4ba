import { describe, it, expect, vi } from 'vitest';
import { AI_PROMPTS } from '../config/prompts.js';
import { QuestionExtractionService } from '../services/extraction/QuestionExtractionService.js';
import type { ChatClient } from '../services/llm/ChatClient.js';
import { ExtractionError } from '../utils/errorHandler.js';

const TEMPLATE_KEYS = [
  'question_id', 'grade', 'volume', 'chapter', 'section', 'subject', 'question_content',
  'question_options', 'question_images', 'question_tables', 'analysis_images', 'difficulty',
  'question_type', 'source', 'knowledge_points', 'sub_questions', 'answer', 'resolve',
  'source_year', 'source_province'
];

function fakeClient(reply: string) {
  const complete = vi.fn().mockResolvedValue(reply);
  const client: ChatClient = { complete };
  return { client, complete };
}

function service(reply: string) {
  const { client, complete } = fakeClient(reply);
  return { extractor: new QuestionExtractionService(client, { model: 'test-model', enableThinking: false }), complete };
}

describe('QuestionExtractionService.extract', () => {
  it('sends the extraction prompts with the thinking switch', async () => {
    const { extractor, complete } = service('[]');

    await extractor.extract('# Paper');

    expect(complete).toHaveBeenCalledTimes(1);
    const request = complete.mock.calls[0][0];
    expect(request.model).toBe('test-model');
    expect(request.chat_template_kwargs).toEqual({ enable_thinking: false });
    expect(request.messages[0]).toEqual({ role: 'system', content: AI_PROMPTS.questionExtraction.system });
    expect(request.messages[1]).toEqual({ role: 'user', content: 'Extract the questions from the following text:\n\n# Paper' });
  });

  it('embeds the JSON template in the system prompt', () => {
    expect(AI_PROMPTS.questionExtraction.system).not.toContain('{{TEMPLATE}}');
    expect(AI_PROMPTS.questionExtraction.system).toContain('"source_province": "江苏"');
  });

  it('normalises records from a fenced array reply', async () => {
    const reply = '```json\n' + JSON.stringify([{
      question_id: 1,
      question_content: '1+1=?',
      question_options: 'A. 2',
      knowledge_points: null,
      extra: 'dropped',
      sub_questions: [{ question_id: '1', image: ['imgs/a.jpg'] }, 'bad']
    }]) + '\n```';
    const { extractor } = service(reply);

    const result = await extractor.extract('md');

    expect(result.kind).toBe('structured');
    if (result.kind !== 'structured') return;
    expect(result.questions).toHaveLength(1);
    const [question] = result.questions;
    expect(Object.keys(question)).toEqual(TEMPLATE_KEYS);
    expect(question.question_id).toBe('1');
    expect(question.question_content).toBe('1+1=?');
    expect(question.question_options).toEqual(['A. 2']);
    expect(question.knowledge_points).toEqual([]);
    expect(question.answer).toBe('');
    expect(question.sub_questions).toEqual([
      { question_id: '1', question: '', image: 'imgs/a.jpg', question_type: '', option: [] }
    ]);
  });

  it('unwraps arrays under questions or data', async () => {
    const wrapped = await service('{"questions": [{"question_id": "1"}, {"question_id": "2"}]}').extractor.extract('md');
    const data = await service('{"data": [{"question_id": "7"}]}').extractor.extract('md');

    expect(wrapped.kind === 'structured' && wrapped.questions.map(q => q.question_id)).toEqual(['1', '2']);
    expect(data.kind === 'structured' && data.questions.map(q => q.question_id)).toEqual(['7']);
  });

  it('accepts a single record and drops non-object items', async () => {
    const single = await service('{"question_id": "5", "answer": "B"}').extractor.extract('md');
    const mixed = await service('[1, "x", null, {"question_id": "3"}]').extractor.extract('md');

    expect(single.kind === 'structured' && single.questions.map(q => q.answer)).toEqual(['B']);
    expect(mixed.kind === 'structured' && mixed.questions.map(q => q.question_id)).toEqual(['3']);
  });

  it('keeps records whose list fields arrive as scalars or objects', () => {
    const questions = QuestionExtractionService.normalizeQuestions([
      { question_id: '1', knowledge_points: 5, question_tables: true },
      { question_id: '2', question_options: { a: 1 } }
    ]);

    expect(questions.map(q => q.question_id)).toEqual(['1', '2']);
    expect(questions[0].knowledge_points).toEqual(['5']);
    expect(questions[0].question_tables).toEqual(['true']);
    expect(questions[1].question_options).toEqual([]);
  });

  it('keeps unparseable replies as raw text', async () => {
    const result = await service('Sorry, I cannot read this page.').extractor.extract('md');

    expect(result).toEqual({ kind: 'raw', text: 'Sorry, I cannot read this page.' });
  });

  it('fails on an empty reply', async () => {
    await expect(service('   ').extractor.extract('md')).rejects.toThrow(ExtractionError);
  });
});
