import type { EvidenceBundle, FileResult } from "../types.js";

/**
 * Documents and audio contribute text; documents and video contribute a
 * one-line summary. Images only appear in `results`.
 */
export function aggregateEvidence(sessionId: string, results: FileResult[]): EvidenceBundle {
  const textParts: string[] = [];
  const fileSummaries: string[] = [];

  for (const result of results) {
    switch (result.category) {
      case "document": {
        if (result.rawEvidenceText === undefined) {
          break;
        }
        textParts.push(`--- DOCUMENT: ${result.fileName} ---\n${result.rawEvidenceText}\n`);
        const danger = result.report?.misinformationAnalysis.dangerScore ?? 0;
        fileSummaries.push(`${result.fileName}: DANGER SCORE ${danger}/100.`);
        break;
      }
      case "audio": {
        const transcript = result.report?.text ?? "";
        if (transcript) {
          textParts.push(`--- AUDIO: ${result.fileName} ---\n${transcript}\n`);
        }
        break;
      }
      case "video":
        if (result.report) {
          fileSummaries.push(
            `${result.fileName}: Video Fake Ratio: ${result.report.frameAnalysis.fakeRatioPercent}%`,
          );
        }
        break;
      case "image":
        break;
    }
  }

  return {
    sessionId,
    results,
    aggregateText: textParts.join("\n"),
    fileSummaries,
  };
}
