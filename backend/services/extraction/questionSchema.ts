import { z } from 'zod';

// Models answer loosely: numbers for ids, null for absent values, a bare string for a one-item list
const text = z.preprocess((value) => {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    const first: unknown = value.find(item => typeof item === 'string' || typeof item === 'number');
    return first === undefined ? '' : String(first);
  }
  if (typeof value === 'object') return JSON.stringify(value);
  return value;
}, z.string());

const textList = z.preprocess((value) => {
  if (value === null || value === undefined) return [];
  if (typeof value === 'string') return value.trim() === '' ? [] : [value];
  if (typeof value === 'number' || typeof value === 'boolean') return [String(value)];
  if (!Array.isArray(value)) return [];
  return value;
}, z.array(text));

export const SubQuestionSchema = z.object({
  question_id: text,
  question: text,
  image: text,
  question_type: text,
  option: textList
});

export const QuestionRecordSchema = z.object({
  question_id: text,
  grade: text,
  volume: text,
  chapter: text,
  section: text,
  subject: text,
  question_content: text,
  question_options: textList,
  question_images: textList,
  question_tables: textList,
  analysis_images: textList,
  difficulty: text,
  question_type: text,
  source: text,
  knowledge_points: textList,
  sub_questions: z.preprocess(
    value => (Array.isArray(value) ? value.filter(item => typeof item === 'object' && item !== null) : []),
    z.array(SubQuestionSchema)
  ),
  answer: text,
  resolve: text,
  source_year: text,
  source_province: text
});

export type SubQuestion = z.infer<typeof SubQuestionSchema>;
export type QuestionRecord = z.infer<typeof QuestionRecordSchema>;
