export interface Question {
  id: number;
  text: string;
  answerHash: string; // hex digest, never the plaintext
}

export type QuestionSummary = Pick<Question, 'id' | 'text'>;
