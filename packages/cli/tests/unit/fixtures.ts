import { buildRuleSet, type RuleSet } from "@restart-triage/core";

export const RULES_YAML = `ignore_paths:
  by_prefix:
    - /proc/
    - /tmp/
catchall_units:
  by_regex:
    - .*\\.scope$
group_services:
  - group: safe
    by_full:
      - cron.service
    by_regex:
      - postfix@.*\\.service
  - group: blip
    by_full:
      - nginx.service
      - mysql.service
`;

export function testRuleSet(): RuleSet {
  return buildRuleSet({
    ignore_paths: { by_prefix: ["/proc/", "/tmp/", "["] },
    catchall_units: { by_regex: [".*\\.scope$"] },
    group_services: [
      { group: "safe", by_full: ["cron.service"] },
      { group: "blip", by_full: ["nginx.service"], by_regex: ["php\\d.*-fpm\\.service"] },
    ],
  });
}
