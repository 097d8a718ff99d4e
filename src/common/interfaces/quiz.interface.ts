export interface QuizMeta {
  createdAt: number;
  educators: number;
  hashAlgorithm: string; // algorithm every stored answer hash was made with
}
