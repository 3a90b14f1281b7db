export type ModelCandidate = string;

export type ResponseShapeKind = "text" | "structured";

export type ResponseShape<T> = {
  kind: ResponseShapeKind;
  /** Turns raw model text into the payload; throws ResponseShapeError when it does not fit. */
  parse(text: string): T;
};

export type OrchestrationRequest<T> = Readonly<{
  prompt: string;
  shape: ResponseShape<T>;
}>;

export type AttemptOutcome<T> =
  | { kind: "success"; payload: T }
  | { kind: "rate_limited"; detail: string }
  | { kind: "transport_error"; detail: string }
  | { kind: "schema_invalid"; detail: string };

export type AttemptKind = AttemptOutcome<unknown>["kind"];

export type AttemptRecord = {
  model: ModelCandidate;
  kind: AttemptKind;
  detail?: string;
  latencyMs: number;
};

export type OrchestrationResult<T> =
  | { ok: true; payload: T; model: ModelCandidate; attempts: AttemptRecord[] }
  | { ok: false; lastError: string; attempts: AttemptRecord[] };

export type GenerateOptions = {
  json?: boolean;
};

export interface GenerationService {
  generate(model: ModelCandidate, prompt: string, options?: GenerateOptions): Promise<string>;
}

export type CodeSnapshot = {
  id: number;
  code: string;
  language: string;
  created_at: string;
};

export type Project = {
  id: number;
  project_name: string;
  code: string;
  language: string;
  is_favorite: boolean;
  created_at: string;
};

export type ChatEntry = {
  id: number;
  user_message: string;
  ai_response: string;
  created_at: string;
};

export interface AssessmentStore {
  appendChat(userMessage: string, aiResponse: string): number;
  insertCodeSnapshot(code: string, language: string): number;
  insertProject(name: string, code: string, language: string): number;
  listProjects(): Project[];
  setFavorite(id: number, favorite: boolean): boolean;
  deleteProject(id: number): boolean;
  latestSnapshot(): CodeSnapshot | undefined;
  listChat(): ChatEntry[];
}

export type ChatTranscript = Pick<AssessmentStore, "appendChat">;

export type AnalyzeCodeInput = {
  code: string;
  targetLang: string;
};

export type ChatInput = {
  message: string;
  codeContext: string;
};
