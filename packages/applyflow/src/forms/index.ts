export { FieldDetector, type FieldDetectorOptions } from './FieldDetector.js';
export { FormFiller, isResumeField, type FormFillerOptions } from './FormFiller.js';
export { applyAnswer, fieldTypeOf, toChecked, type ApplyOutcome, type ApplyOptions } from './applyAnswer.js';
export {
  PlaywrightFormElement,
  PlaywrightFormHandle,
  PlaywrightQuestionElement,
  type PlaywrightFormOptions,
} from './playwrightForm.js';
export type {
  AnswerCandidate,
  AnswerMap,
  AnswerValue,
  FieldDescriptor,
  FieldFillResult,
  FieldFillStatus,
  FieldType,
  FillReport,
  FormElement,
  FormHandle,
  QuestionElement,
  SelectStrategy,
} from './types.js';
