export { Calculator } from './calculator';
export {
    CalculatorError,
    DivisionByZeroError,
    InvalidInputError,
    OutOfRangeError,
    OverflowError,
    isCalculatorError,
} from './errors';
export {
    OVERFLOW_THRESHOLD,
    add,
    divide,
    modulo,
    multiply,
    power,
    safeDivide,
    subtract,
} from './operations';
export { formatRecord } from './types';
export type { ArithmeticOperation, OperationName, OperationRecord } from './types';
export {
    MAX_SAFE_VALUE,
    MIN_SAFE_VALUE,
    validateNonZero,
    validateNumber,
    validatePositive,
    validateRange,
} from './validators';
