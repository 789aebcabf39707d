import "dotenv/config";
import { HrAnalyzerService } from "../src/analysis/hr-analyzer.service";
import { createLogger } from "../src/config/logger";

function run(): void {
  const logger = createLogger({ minLevel: "debug" });
  const analyzer = new HrAnalyzerService(logger);
  const question = "Tell me about a time you faced a significant challenge at work.";

  const strongAnswer =
    "At my previous company our checkout service kept failing during peak traffic, and the problem was costing us orders every weekend. " +
    "I was responsible for stabilising it before the holiday sale, so my goal was zero downtime for the busiest week of the year. " +
    "I led a small team, implemented request queueing, and designed a load test that reproduced the failure in staging. " +
    "I decided to roll the change out behind a flag and coordinated with the support team so they knew what to watch for. " +
    "As a result, error rates dropped by 85% and we delivered the sale without a single outage.";
  const weakAnswer = "I worked hard and it went well I guess.";

  const strong = analyzer.analyze({ answer: strongAnswer, question });
  const weak = analyzer.analyze({ answer: weakAnswer, question });

  console.log("Strong answer:", { total: strong.totalScore, structure: strong.structure, confidence: strong.confidence });
  console.log(strong.feedback);
  console.log("Weak answer:", { total: weak.totalScore, redFlags: weak.details.redFlags });
  console.log(weak.feedback);

  if (strong.totalScore <= weak.totalScore) {
    throw new Error("Expected the strong answer to outscore the weak answer");
  }
  console.log("hr-analyzer sanity passed");
}

try {
  run();
} catch (error) {
  console.error("hr-analyzer sanity failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
