export { IntentClassifier, isHelpRequest, DEFAULT_CONFIDENCE_THRESHOLD } from './intent-classifier';
export type {
  IntentJudge,
  IntentJudgeInput,
  IntentJudgment,
  IntentDecision,
  IntentSource,
} from './intent-classifier';
