export {
  type CheckBinding,
  CheckEngine,
  type CheckEngineDeps,
  type FailureReporter,
} from "./core/check-engine"
export {
  type CheckFailureDetails,
  CheckFailureError,
  formatCheckFailure,
  formatFrames,
  type IncomparableOperandsDetails,
  IncomparableOperandsError,
} from "./core/errors"
export { compareOperands, operandType, renderOperand } from "./core/operands"
export { type ComparisonOperator, comparisonOperators } from "./ports/comparison"
