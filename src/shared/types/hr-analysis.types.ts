export type StarComponent = "situation" | "task" | "action" | "result";

export type StarComponentSet = Record<StarComponent, boolean>;

export type GibberishSeverity = 0 | 1 | 2 | 3;

export interface GibberishVerdict {
  severity: GibberishSeverity;
  issues: string[];
  isGibberish: boolean;
}

export type QuestionType =
  | "challenge"
  | "difficult team member"
  | "leadership"
  | "failed"
  | "deadline"
  | "above and beyond"
  | "persuade"
  | "feedback";

export interface RelevanceVerdict {
  relevanceScore: number;
  questionType: QuestionType | "none";
  issues: string[];
  isRelevant: boolean;
}

export interface AnalysisDetails {
  starComponentsFound: StarComponentSet;
  confidenceKeywordCount: number;
  leadershipKeywordCount: number;
  redFlags: string[];
  relevanceIssues: string[];
}

export interface AnalysisResult {
  clarity: number;
  confidence: number;
  structure: number;
  totalScore: number;
  feedback: string;
  isValid: boolean;
  rejectionReason?: string;
  details: AnalysisDetails;
}

export interface AnalyzeInput {
  answer: string;
  question?: string;
}

export interface HrQuestion {
  question: string;
  focus: string[];
}
