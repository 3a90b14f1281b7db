import type { AnalyzeCodeInput, ChatInput } from "../types";

const MAX_CHAT_CONTEXT_CHARS = 12000;

export function buildAnalysisPrompt(input: AnalyzeCodeInput): string {
  return [
    "You are a strict senior code reviewer assessing a candidate's submission.",
    `Target language: ${input.targetLang}.`,
    "Tasks:",
    "1. Detect the language the code is written in.",
    "2. List every syntax, logic and runtime error of the ORIGINAL code with its 1-based line number.",
    `3. Rewrite the code as a complete, fully fixed program in ${input.targetLang}.`,
    "4. Explain the fixed code line by line.",
    "5. Estimate best, average and worst time and space complexity, with a short description of each.",
    "6. Judge integrity (does the code do what it claims) and the likelihood that it was copied from a public source.",
    "7. Score overall quality from 0 to 100, maintainability index from 0 to 100 and readability from 0 to 100.",
    "Return ONLY one JSON object, no markdown and no commentary, with exactly these keys:",
    '{"detected_language": string, "quality_score": integer, "integrity_check": string,',
    ' "plagiarism_check": string, "error_table": [{"line": integer, "error": string}],',
    ' "final_code": string, "code_explanation": [{"line": integer, "code": string, "explanation": string}],',
    ' "complexity": {"time": {"best": string, "average": string, "worst": string, "desc": string},',
    '                "space": {"best": string, "average": string, "worst": string, "desc": string}},',
    ' "maintainability_index": integer, "readability_score": integer, "target_complexity": string}',
    "Use an empty error_table when the original code has no errors.",
    "",
    "Code:",
    input.code
  ].join("\n");
}

export function buildChatPrompt(input: ChatInput): string {
  const context = input.codeContext.trim().slice(0, MAX_CHAT_CONTEXT_CHARS);
  return [
    "You are a coding assistant inside a code assessment tool. Answer concisely and precisely.",
    "Only expand into detailed steps when the user explicitly asks for them.",
    context ? `\nCode currently in the editor:\n${context}\n` : "",
    `User question: ${input.message}`
  ].join("\n");
}
