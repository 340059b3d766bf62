export { InstructionSet } from './instruction-set.js';
export { DslInstructionParser } from './parser.js';
export {
  InstructionSchema,
  ignoreEventType,
  minConfidence,
  type Instruction,
  type IgnoreEventTypeInstruction,
  type MinConfidenceInstruction,
  type InstructionParser,
} from './types.js';
