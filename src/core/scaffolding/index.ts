export {
  initialScaffoldState,
  strategyForLevel,
  transition,
} from './scaffold-state-machine';
export type { ScaffoldTransition, TransitionOutcome } from './scaffold-state-machine';
