import type { Request, Response } from 'express';
import type { UnitRegistry } from './registry.js';
import type { BatchErrorKind, CalculationResult } from './types.js';
import { evaluate } from './calculator.js';
import { REGISTRY_BASE_TYPES } from './units.js';
import { isObject, normalizeToArray, DEFAULT_MAX_EXPRESSION_LENGTH } from './utils.js';

type BatchResult =
  | { expression: string; status: 'success'; result: CalculationResult }
  | { expression: string; status: 'error'; kind: BatchErrorKind; message: string };

export type ControllerOptions = {
  maxExpressionLength?: number;
}

export class Controllers {
  private readonly maxExpressionLength: number;

  constructor(private registry: UnitRegistry, options: ControllerOptions = {}) {
    this.maxExpressionLength = options.maxExpressionLength ?? DEFAULT_MAX_EXPRESSION_LENGTH;
  }

  evaluateExpression = withErrorHandling((req: Request, res: Response): void => {
    const body: unknown = req.body;
    const expression = isObject(body) ? body.expression : undefined;

    if (typeof expression !== 'string') {
      res.status(400).json({
        error: 'Invalid request body',
        message: 'expression must be a string, got ' + typeof expression
      });
      return;
    }

    if (expression.length > this.maxExpressionLength) {
      res.status(400).json({
        error: 'Invalid request body',
        message: `Expression exceeds maximum length of ${this.maxExpressionLength} characters`
      });
      return;
    }

    const outcome = evaluate(expression, this.registry);
    if (!outcome.ok) {
      res.status(422).json({ error: 'Calculation error', ...outcome.error });
      return;
    }

    res.status(200).json({ result: outcome.result });
  })

  evaluateBatch = withErrorHandling((req: Request, res: Response): void => {
    // Accept a list of expressions or a single one
    const expressions = normalizeToArray(req.body);
    if (!expressions) {
      res.status(400).json({
        error: 'Invalid request body',
        message: 'expected { expressions: string[] } or { expression: string }'
      });
      return;
    }

    const results = expressions.map((expression): BatchResult => {
      if (expression.length > this.maxExpressionLength) {
        return {
          expression,
          status: 'error',
          kind: 'ExpressionTooLong',
          message: `Expression exceeds maximum length of ${this.maxExpressionLength} characters`
        }
      }

      const outcome = evaluate(expression, this.registry);
      return outcome.ok
        ? { expression, status: 'success', result: outcome.result }
        : { expression, status: 'error', ...outcome.error };
    })

    res.status(200).json({ results });
  })

  listUnits = withErrorHandling((_req: Request, res: Response): void => {
    const formats = Object.fromEntries(
      REGISTRY_BASE_TYPES.map((dimension) => [dimension, this.registry.formatRules(dimension)])
    );

    res.status(200).json({
      units: this.registry.entries().map(({ key, base, multiplier, displayName }) => ({
        key,
        dimension: base,
        multiplier,
        displayName,
      })),
      formats,
    });
  })

  healthCheck = (_req: Request, res: Response): void => {
    res.status(200).json({ ok: true});
  }
}

type ControllerHandler = (req: Request, res: Response) => void;
const withErrorHandling = (handler: ControllerHandler): ControllerHandler => {
  return (req: Request, res: Response): void => {
    try {
      handler(req, res);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Unhandled error on ${req.method} ${req.path}: ${message}`);
      res.status(500).json({
        error: 'Internal server error',
        message
      });
    }
  };
};
