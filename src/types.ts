// ============================================================
// Arithmetic Engine - Type Definitions
// ============================================================

// ------------------------------------------------------------
// Operation names recorded in history
// ------------------------------------------------------------
export type ArithmeticOperation = 'add' | 'subtract' | 'multiply' | 'divide' | 'power';

export type OperationName = 'init' | 'set' | 'clear' | ArithmeticOperation;

// ------------------------------------------------------------
// History Record
// ------------------------------------------------------------
export interface OperationRecord {
    readonly value: number;                // Calculator value after the step
    readonly operation: OperationName;
    readonly operands: readonly number[];  // Empty for init and clear
}

export function createRecord(
    value: number,
    operation: OperationName,
    operands: readonly number[] = []
): OperationRecord {
    return Object.freeze({
        value,
        operation,
        operands: Object.freeze([...operands]),
    });
}

/**
 * Renders a record as `operation(operands) = value`, e.g. `add(5) = 15`.
 */
export function formatRecord(record: OperationRecord): string {
    return `${record.operation}(${record.operands.map(String).join(', ')}) = ${String(record.value)}`;
}
