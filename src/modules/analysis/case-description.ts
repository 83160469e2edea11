export type FollowUpMessage = {
  role: "lawyer" | "applicant";
  content: string;
};

/** Text already extracted from a case file by upstream services. */
export type CaseMaterials = {
  summary?: string;
  transcription?: string;
  formsText?: string;
  followUp?: FollowUpMessage[];
};

const section = (title: string, body: string | undefined): string | null => {
  const text = body?.trim();
  return text ? `## ${title}\n${text}` : null;
};

/**
 * Composes the analysis query for a case: the lawyer's question followed by
 * labelled sections for each available material. Without materials the
 * question is returned as is.
 */
export function buildCaseQueryText(question: string, materials?: CaseMaterials): string {
  const trimmedQuestion = question.trim();
  if (!materials) {
    return trimmedQuestion;
  }

  const followUp = (materials.followUp ?? [])
    .filter((message) => message.content.trim().length > 0)
    .map((message) => `${message.role === "lawyer" ? "Lawyer" : "Applicant"}: ${message.content.trim()}`)
    .join("\n");

  const sections = [
    section("Case summary", materials.summary),
    section("Interview transcript", materials.transcription),
    section("Application forms", materials.formsText),
    section("Follow-up questions", followUp)
  ].filter((value): value is string => value !== null);

  if (sections.length === 0) {
    return trimmedQuestion;
  }

  return [`## Question\n${trimmedQuestion}`, ...sections].join("\n\n");
}
