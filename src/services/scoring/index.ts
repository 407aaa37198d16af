export { closeness } from './closeness';
export { scorePeriod, scorePeriods } from './periodScorer';
export type { PeriodScore, PeriodComponent } from './periodScorer';
export { scoreExtraPeriods } from './extraPeriodScorer';
export type { ExtraPeriodComponent } from './extraPeriodScorer';
export { countLeadChanges, scoreLeadChanges } from './leadChangeScorer';
export type { LeadChangeComponent } from './leadChangeScorer';
export { findBuzzerBeaters, isGameDeciding, scoreBuzzerBeaters } from './buzzerBeaterScorer';
export type { BuzzerBeaterComponent } from './buzzerBeaterScorer';
export { aggregateShooting, buildShootingBaseline, scoreShootingEfficiency } from './shootingEfficiencyScorer';
export type { ShootingBaseline, ShootingEfficiencyComponent, ShootingPercentages } from './shootingEfficiencyScorer';
export { closingAverageMargin, isStarPerformance, scoreMarginAndStars } from './marginStarScorer';
export type { MarginStarOutcome, MarginStarScores, MarginStarUnavailable } from './marginStarScorer';
export { assignGrade } from './gradeAssigner';
