/**
 * Relocation target expressions
 *
 * Each node is an opcode byte followed by its payload. Leaves carry a 32 bit
 * immediate or a 16 bit symbol / section index. Operators carry no payload and
 * are followed by their two operands, right then left.
 */

import { BufferReader } from "./bufferReader";
import { ExprOpcode, isExprOpcode } from "./constants";
import {
  ExpressionTooDeepError,
  UnknownExpressionOpcodeError,
} from "./errors";

export type Expression =
  | { type: "value"; value: number }
  | { type: "symbol"; symbolIndex: number }
  | { type: "sectionBase"; sectionIndex: number }
  | { type: "sectionStart"; sectionIndex: number }
  | { type: "sectionEnd"; sectionIndex: number }
  | BinaryExpression;

export interface BinaryExpression {
  type: "add" | "sub" | "div";
  left: Expression;
  right: Expression;
}

export type BinaryOperator = BinaryExpression["type"];

export const MAX_EXPRESSION_DEPTH = 256;

export function parseExpression(reader: BufferReader, depth = 0): Expression {
  const start = reader.offset();
  if (depth >= MAX_EXPRESSION_DEPTH) {
    throw new ExpressionTooDeepError(start, MAX_EXPRESSION_DEPTH);
  }
  const opcode = reader.readByte();
  if (!isExprOpcode(opcode)) {
    reader.seek(start);
    throw new UnknownExpressionOpcodeError(start, opcode);
  }

  switch (opcode) {
    case ExprOpcode.VALUE:
      return { type: "value", value: reader.readInt32() };
    case ExprOpcode.SYMBOL:
      return { type: "symbol", symbolIndex: reader.readWord() };
    case ExprOpcode.SECTION_BASE:
      return { type: "sectionBase", sectionIndex: reader.readWord() };
    case ExprOpcode.SECTION_START:
      return { type: "sectionStart", sectionIndex: reader.readWord() };
    case ExprOpcode.SECTION_END:
      return { type: "sectionEnd", sectionIndex: reader.readWord() };
    case ExprOpcode.ADD:
      return parseOperands("add", reader, depth);
    case ExprOpcode.SUB:
      return parseOperands("sub", reader, depth);
    case ExprOpcode.DIV:
      return parseOperands("div", reader, depth);
  }
}

function parseOperands(
  type: BinaryOperator,
  reader: BufferReader,
  depth: number
): BinaryExpression {
  const right = parseExpression(reader, depth + 1);
  const left = parseExpression(reader, depth + 1);
  return { type, left, right };
}

const operatorSymbols: Record<BinaryOperator, string> = {
  add: "+",
  sub: "-",
  div: "/",
};

/**
 * Human readable form, e.g. `(sectionStart(2) + $10)`
 */
export function formatExpression(
  expression: Expression,
  symbolName?: (symbolIndex: number) => string | undefined
): string {
  switch (expression.type) {
    case "value":
      return expression.value < 0
        ? "-$" + (-expression.value).toString(16)
        : "$" + expression.value.toString(16);
    case "symbol":
      return (
        symbolName?.(expression.symbolIndex) ??
        `symbol(${expression.symbolIndex})`
      );
    case "sectionBase":
    case "sectionStart":
    case "sectionEnd":
      return `${expression.type}(${expression.sectionIndex})`;
    case "add":
    case "sub":
    case "div":
      return `(${formatExpression(expression.left, symbolName)} ${
        operatorSymbols[expression.type]
      } ${formatExpression(expression.right, symbolName)})`;
  }
}

export interface ExpressionReferences {
  symbols: number[];
  sections: number[];
}

/**
 * Collect symbol and section indexes an expression depends on, in order of first appearance
 */
export function expressionReferences(
  expression: Expression
): ExpressionReferences {
  const symbols = new Set<number>();
  const sections = new Set<number>();
  const visit = (exp: Expression) => {
    switch (exp.type) {
      case "value":
        break;
      case "symbol":
        symbols.add(exp.symbolIndex);
        break;
      case "sectionBase":
      case "sectionStart":
      case "sectionEnd":
        sections.add(exp.sectionIndex);
        break;
      default:
        visit(exp.left);
        visit(exp.right);
    }
  };
  visit(expression);
  return { symbols: [...symbols], sections: [...sections] };
}

/**
 * Supplies the addresses a host has assigned once sections are placed
 */
export interface AddressResolver {
  symbolAddress(symbolIndex: number): number;
  sectionBase(sectionIndex: number): number;
  sectionStart(sectionIndex: number): number;
  sectionEnd(sectionIndex: number): number;
}

/**
 * Compute the value of an expression with 32 bit wrap-around arithmetic
 */
export function evaluateExpression(
  expression: Expression,
  resolver: AddressResolver
): number {
  switch (expression.type) {
    case "value":
      return expression.value;
    case "symbol":
      return resolver.symbolAddress(expression.symbolIndex) | 0;
    case "sectionBase":
      return resolver.sectionBase(expression.sectionIndex) | 0;
    case "sectionStart":
      return resolver.sectionStart(expression.sectionIndex) | 0;
    case "sectionEnd":
      return resolver.sectionEnd(expression.sectionIndex) | 0;
  }

  const left = evaluateExpression(expression.left, resolver);
  const right = evaluateExpression(expression.right, resolver);
  switch (expression.type) {
    case "add":
      return (left + right) | 0;
    case "sub":
      return (left - right) | 0;
    case "div":
      if (right === 0) {
        throw new RangeError(
          "Unable to evaluate expression: " + formatExpression(expression)
        );
      }
      return Math.trunc(left / right) | 0;
  }
}
