/**
 * Category assignment for auto-grown knowledge entries.
 * First category (in table order) with a keyword contained in the text wins.
 */

import type { KnowledgeCategory } from '../types/models.js';

export const FALLBACK_CATEGORY: KnowledgeCategory = 'general';

export const CATEGORY_KEYWORDS: ReadonlyArray<{
  category: KnowledgeCategory;
  keywords: readonly string[];
}> = [
  {
    category: 'schedules',
    keywords: ['расписание', 'пары', 'занятия', 'schedule', 'timetable', 'кесте'],
  },
  {
    category: 'documents',
    keywords: ['справка', 'документ', 'заявление', 'document', 'certificate', 'анықтама'],
  },
  {
    category: 'scholarships',
    keywords: ['стипендия', 'стипендии', 'грант', 'scholarship', 'grant', 'шәкіртақы'],
  },
  {
    category: 'exams',
    keywords: ['экзамен', 'сессия', 'зачет', 'exam', 'емтихан'],
  },
  {
    category: 'administration',
    keywords: ['деканат', 'ректорат', 'администрация', 'dean', 'office', 'әкімшілік'],
  },
];

export function categorize(text: string): KnowledgeCategory {
  const lowered = text.toLowerCase();

  for (const { category, keywords } of CATEGORY_KEYWORDS) {
    if (keywords.some((k) => lowered.includes(k))) {
      return category;
    }
  }

  return FALLBACK_CATEGORY;
}
