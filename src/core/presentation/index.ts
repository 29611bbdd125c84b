export {
  buildExerciseView,
  fillBlanks,
  shuffle,
  sample,
  BLANK_MARK,
  MISSING_WORD,
  MAX_DISTRACTORS,
} from './exercise-view';
export type { ExerciseView } from './exercise-view';
