export interface CategoryTypes {
  id: number;
  type: string;
}

export interface QuestionTypes {
  id: number;
  question: string;
  answer: string;
  category: number;
  difficulty: number;
}

export type NewQuestion = Omit<QuestionTypes, "id">;

export interface QuestionFilter {
  category?: number;
  // case-insensitive substring of the question text
  search?: string;
  excludeIds?: number[];
}

export type CategoryMap = Record<number, string>;

export interface QuestionListResponse {
  success: true;
  questions: QuestionTypes[];
  total_questions: number;
  categories?: CategoryMap;
  current_category: number | null;
}
