export type BaseType = 'byte' | 'second' | 'meter' | 'unit' | 'dataRate';

// dataRate only ever comes out of a division, never out of the registry
export type RegistryBaseType = Exclude<BaseType, 'dataRate'>;

export type Operator = '+' | '-' | '*' | '/';

export type UnitDef = {
  base: RegistryBaseType;
  multiplier: number; // base units per one of this unit
  displayName: string;
}

export type UnitEntry = UnitDef & { key: string };

// value is always expressed in the base unit of baseType
export type UnitValue = {
  value: number;
  baseType: BaseType;
  unitKey?: string;
}

export type Token =
  | { type: 'value'; value: UnitValue }
  | { type: 'operator'; op: Operator }
  | { type: 'leftParen' }
  | { type: 'rightParen' };

export type FormatRule = {
  threshold: number;
  suffix: string;
}

export type Projection = {
  period: string;
  formattedData: string;
}

export type CalculationResult = {
  mainDisplay: string;
  baseValueDisplay: string;
  isDataRate: boolean;
  projections: Projection[];
}

export type CalcErrorKind =
  | 'EmptyInput'
  | 'UnknownUnit'
  | 'UnrecognizedToken'
  | 'MismatchedParentheses'
  | 'MissingOperand'
  | 'DimensionMismatch'
  | 'DivisionByZero'
  | 'UnsupportedOperator'
  | 'TooManyOperands';

// Rejected by the HTTP layer before any calculation runs
export type BatchErrorKind = CalcErrorKind | 'ExpressionTooLong';

export type EvaluationOutcome =
  | { ok: true; result: CalculationResult }
  | { ok: false; error: { kind: CalcErrorKind; message: string } };
