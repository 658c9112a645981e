import { AnswerMode } from "../../config/env.js";

export interface GroundedAnswerRequest {
  question: string;
  prompt: string;
}

export interface AiClient {
  getAnswerMode(): AnswerMode;
  generateGroundedAnswer(request: GroundedAnswerRequest): Promise<string | null>;
}
