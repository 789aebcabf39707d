export const WE_HEAVY_ANSWER =
  "Last year our team faced a hard migration at the company. We planned the work together and we split it into phases. " +
  "Then we built a shared checklist, and we tested every service in staging. After that we moved traffic slowly while we " +
  "watched the dashboards closely. I wrote the rollback notes for the group. In the end the migration was a success and " +
  "customers never noticed any downtime during the switch, which made the whole department proud of the effort.";

export const STRONG_STAR_ANSWER =
  "At my previous company, our mobile checkout kept crashing during peak sales, and the problem was costing us thousands of orders. " +
  "I was responsible for the fix, and my goal was to make checkout stable before the holiday launch. " +
  "I led a small team of three engineers and coordinated daily with the product manager. " +
  "I decided to add crash reporting first, then I implemented a retry queue and designed a load test that reproduced the failure. " +
  "I mentored a junior engineer through the rollout and delivered the release two weeks early. " +
  "As a result, crashes dropped by 40% and conversion improved during the busiest week of the year.";

export const SHORT_STAR_ANSWER =
  "When our billing service kept failing, my goal was to stop the outages. I implemented retries and designed an alert. " +
  "As a result, outages fell by 40% in a month.";

export const ACTION_ONLY_ANSWER =
  "I implemented retries for the billing service and then I wrote some notes about the retry logic for the other engineers.";

export const CALM_ANSWER =
  "The weather on the coast was calm and the sea looked quiet all morning so the boats stayed near the harbor walls.";

export const VAGUE_SHORT_ANSWER = "I worked hard and it went well I guess.";
