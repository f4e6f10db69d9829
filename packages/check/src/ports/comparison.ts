export const comparisonOperators = ["==", "!=", "<=", ">=", "<", ">"] as const

/** The relation a binary check expects to hold between its operands. */
export type ComparisonOperator = (typeof comparisonOperators)[number]
