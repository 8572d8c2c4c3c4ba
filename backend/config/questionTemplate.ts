import type { QuestionRecord } from '../types/index.js';

/**
 * Reference records shown to the extraction model: one composite question with
 * sub-questions and one standalone choice question.
 */
export const QUESTION_TEMPLATE: QuestionRecord[] = [
  {
    question_id: '1',
    grade: '',
    volume: '',
    chapter: '',
    section: '',
    subject: '',
    question_content: '阅读材料，回答问题。\n已知函数 $f(x)=x^2-2x+3$，如图所示。\n![](imgs/img_in_image_box_120_340_560_720.jpg)',
    question_options: [],
    question_images: ['imgs/img_in_image_box_120_340_560_720.jpg'],
    question_tables: [],
    analysis_images: [],
    difficulty: '中等(0.65)',
    question_type: '解答题',
    source: '2024·江苏南京·期末',
    knowledge_points: ['二次函数的图像与性质', '函数的最值'],
    sub_questions: [
      {
        question_id: '1',
        question: '(1) 求 $f(x)$ 的对称轴；',
        image: '',
        question_type: '解答题',
        option: []
      },
      {
        question_id: '2',
        question: '(2) $f(x)$ 在 $[0,3]$ 上的最小值为',
        image: '',
        question_type: '选择题',
        option: ['A. 1', 'B. 2', 'C. 3', 'D. 6']
      }
    ],
    answer: '1. $x=1$, 2.B',
    resolve: '(1) 配方得 $f(x)=(x-1)^2+2$，对称轴为 $x=1$；(2) 当 $x=1$ 时取最小值 $2$，故选 B。',
    source_year: '2024',
    source_province: '江苏'
  },
  {
    question_id: '2',
    grade: '',
    volume: '',
    chapter: '',
    section: '',
    subject: '',
    question_content: '下列各数中，是无理数的是（　）',
    question_options: ['A. $\\frac{1}{3}$', 'B. $\\sqrt{2}$', 'C. $0.5$', 'D. $-1$'],
    question_images: [],
    question_tables: [],
    analysis_images: [],
    difficulty: '容易',
    question_type: '选择题',
    source: '2025年广东省广州市中考数学真题',
    knowledge_points: ['无理数'],
    sub_questions: [],
    answer: 'B',
    resolve: '$\\sqrt{2}$ 是无限不循环小数，是无理数，故选 B。',
    source_year: '2025',
    source_province: '广东'
  }
];
