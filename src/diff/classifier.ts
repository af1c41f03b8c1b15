import type { OracleConfig } from '../config/schema.js';
import type { ChangeLabel, ClassificationPolicy } from './types.js';

// Conventions are case-sensitive: `UrlTest.java` is a test, `Latest.java` is not.
export function policyFromConfig(classification: OracleConfig['classification']): ClassificationPolicy {
  const compile = (patterns: string[]): RegExp[] => patterns.map(pattern => new RegExp(pattern));
  return {
    testPatterns: compile(classification.testPatterns),
    fixPatterns: compile(classification.fixPatterns),
    ignorePatterns: compile(classification.ignorePatterns),
    precedence: [...classification.precedence],
    requireFixChanges: classification.requireFixChanges,
  };
}

export function matchingLabels(filePath: string, policy: ClassificationPolicy): ChangeLabel[] {
  const labels: ChangeLabel[] = [];
  if (policy.testPatterns.some(re => re.test(filePath))) labels.push('test');
  if (policy.fixPatterns.some(re => re.test(filePath))) labels.push('fix');
  if (policy.ignorePatterns.some(re => re.test(filePath))) labels.push('ignore');
  return labels;
}

// Unmatched paths are fix changes: an unclassified edit is more likely part
// of the behavioral fix than a test.
export function classifyPath(filePath: string, policy: ClassificationPolicy): ChangeLabel {
  const labels = matchingLabels(filePath, policy);
  return policy.precedence.find(label => labels.includes(label)) ?? 'fix';
}
