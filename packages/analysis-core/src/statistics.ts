import type { AnalysisResponse, BatchStatistics, PipelineStatistics } from "@callreplay/shared";

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

export function computeBatchStatistics(responses: readonly AnalysisResponse[]): BatchStatistics {
  let analyzed = 0;
  let skipped = 0;
  let errors = 0;
  let issuesDetected = 0;
  const confidences: number[] = [];

  for (const response of responses) {
    switch (response.status) {
      case "analyzed":
        analyzed += 1;
        if (response.analysis.issue_detected) issuesDetected += 1;
        confidences.push(response.analysis.confidence_score);
        break;
      case "skipped":
        skipped += 1;
        break;
      case "error":
        errors += 1;
        break;
    }
  }

  const total = responses.length;
  return {
    total,
    analyzed,
    skipped,
    errors,
    issues_detected: issuesDetected,
    issue_rate: ratio(issuesDetected, analyzed),
    average_confidence: ratio(
      confidences.reduce((sum, value) => sum + value, 0),
      confidences.length,
    ),
    success_rate: ratio(analyzed, total),
  };
}

export function computePipelineStatistics(
  responses: readonly AnalysisResponse[],
): PipelineStatistics {
  const stats = computeBatchStatistics(responses);
  return {
    ...stats,
    processing_efficiency: ratio(stats.analyzed + stats.skipped, stats.total),
  };
}
