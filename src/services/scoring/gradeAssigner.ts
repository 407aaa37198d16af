import { Grade } from '../../types';
import { GradeThreshold } from '../../config/scoringWeights';

const LOWEST_GRADE: Grade = 'D';

/**
 * Step function from total score to grade. Thresholds are inclusive lower bounds,
 * so a score exactly on a boundary takes the higher grade.
 */
export function assignGrade(totalScore: number, thresholds: readonly GradeThreshold[]): Grade {
  if (isNaN(totalScore)) return LOWEST_GRADE;

  const ordered = [...thresholds].sort((a, b) => b.minScore - a.minScore);
  const match = ordered.find(threshold => totalScore >= threshold.minScore);
  return match ? match.grade : LOWEST_GRADE;
}
