import { metrics, trace } from "@opentelemetry/api";

const SERVICE_NAME = "ctf-arena-api";

export const apiTracer = trace.getTracer(SERVICE_NAME);

const meter = metrics.getMeter(SERVICE_NAME);

export const submissionCounter = meter.createCounter("submissions.evaluated", {
  description: "Submissions checked against a challenge rule, labelled by outcome"
});

export const solveCounter = meter.createCounter("submissions.solved", {
  description: "First correct submissions that awarded points"
});

export const evaluationDurationHistogram = meter.createHistogram("submissions.evaluation.duration_ms", {
  description: "Time spent inside the validation dispatcher"
});
