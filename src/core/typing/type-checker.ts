import type { SemanticType } from '../../schema/column-types.js';
import type { SchemaSnapshot } from '../../schema/snapshot.js';
import type {
  AliasNode,
  BinaryNode,
  ColumnRefNode,
  ConditionalNode,
  ExpressionNode,
  FunctionCallNode,
  LiteralNode,
  UnaryNode
} from '../ast/expression-nodes.js';
import { ExpressionVisitor, visitExpression } from '../ast/expression-visitor.js';
import {
  COMPARISON_OPERATORS,
  UNARY_OPERATORS,
  ARITHMETIC_OPERATORS,
  isArithmeticOperator,
  isBitwiseOperator,
  isComparisonOperator,
  isLogicalOperator
} from '../algebra/operators.js';
import { getFunctionSignature } from '../functions/catalog.js';
import {
  areEqualityComparable,
  areOrderComparable,
  familyOf,
  isIntegral,
  isNumeric,
  widen
} from './type-rules.js';
import { TypeMismatchError } from '../errors.js';

const expectBoolean = (type: SemanticType, subject: string, role: string): void => {
  if (type !== 'boolean') {
    throw new TypeMismatchError(subject, `${role} must be boolean, got ${type}`);
  }
};

export interface TypeCheckOptions {
  /** Accept aggregate calls; only grouped selections and having predicates set this */
  allowAggregates?: boolean;
  /** Set while checking the arguments of an aggregate call */
  insideAggregate?: boolean;
}

/**
 * Computes the semantic type of an expression against a schema snapshot,
 * enforcing the operator and function legality rules.
 * Throws UnknownColumnError for references absent from the snapshot and
 * TypeMismatchError for illegal operand types.
 */
export class TypeChecker implements ExpressionVisitor<SemanticType> {
  constructor(
    private readonly schema: SchemaSnapshot,
    private readonly options: TypeCheckOptions = {}
  ) {}

  typeOf(node: ExpressionNode): SemanticType {
    return visitExpression(node, this);
  }

  visitLiteral(node: LiteralNode): SemanticType {
    return node.literalType;
  }

  visitColumnRef(node: ColumnRefNode): SemanticType {
    return this.schema.get(node.name).type;
  }

  visitAlias(node: AliasNode): SemanticType {
    return this.typeOf(node.expression);
  }

  visitUnary(node: UnaryNode): SemanticType {
    const operand = this.typeOf(node.operand);
    if (node.operator === UNARY_OPERATORS.NOT) {
      expectBoolean(operand, node.operator, 'NOT operand');
    }
    return 'boolean';
  }

  visitBinary(node: BinaryNode): SemanticType {
    const { operator } = node;

    if (operator === COMPARISON_OPERATORS.IN || operator === COMPARISON_OPERATORS.NOT_IN) {
      return this.checkMembership(node);
    }

    const left = this.typeOf(node.left);
    const right = this.typeOf(node.right);

    if (isLogicalOperator(operator)) {
      expectBoolean(left, operator, 'left operand');
      expectBoolean(right, operator, 'right operand');
      return 'boolean';
    }

    if (isComparisonOperator(operator)) {
      if (operator === COMPARISON_OPERATORS.LIKE) {
        if (left !== 'string') {
          throw new TypeMismatchError(operator, `LIKE needs a string operand, got ${left}`);
        }
        if (node.right.type !== 'Literal' || node.right.literalType !== 'string') {
          throw new TypeMismatchError(operator, 'LIKE pattern must be a string literal');
        }
        return 'boolean';
      }
      const comparable =
        operator === COMPARISON_OPERATORS.EQUALS || operator === COMPARISON_OPERATORS.NOT_EQUALS
          ? areEqualityComparable(left, right)
          : areOrderComparable(left, right);
      if (!comparable) {
        throw new TypeMismatchError(operator, `cannot compare ${left} with ${right}`);
      }
      return 'boolean';
    }

    if (isArithmeticOperator(operator)) {
      if (!isNumeric(left) || !isNumeric(right)) {
        throw new TypeMismatchError(operator, `arithmetic needs numeric operands, got ${left} and ${right}`);
      }
      if (operator === ARITHMETIC_OPERATORS.POW) return 'double';
      if (operator === ARITHMETIC_OPERATORS.MOD && (!isIntegral(left) || !isIntegral(right))) {
        throw new TypeMismatchError(operator, `MOD needs integer or long operands, got ${left} and ${right}`);
      }
      return widen(left, right);
    }

    if (isBitwiseOperator(operator)) {
      if (!isIntegral(left) || !isIntegral(right)) {
        throw new TypeMismatchError(operator, `bitwise operators need integer or long operands, got ${left} and ${right}`);
      }
      return widen(left, right);
    }

    throw new TypeMismatchError(operator, 'unknown operator');
  }

  visitFunctionCall(node: FunctionCallNode): SemanticType {
    const signature = getFunctionSignature(node.fn);
    if (node.args.length !== signature.arity) {
      throw new TypeMismatchError(node.fn, `expects ${signature.arity} argument(s), got ${node.args.length}`);
    }
    if (signature.aggregate) {
      if (this.options.insideAggregate) {
        throw new TypeMismatchError(node.fn, 'aggregate functions cannot be nested');
      }
      if (!this.options.allowAggregates) {
        throw new TypeMismatchError(node.fn, 'aggregate functions are only allowed in groupBy selections and having');
      }
    }
    const argChecker = signature.aggregate ? new TypeChecker(this.schema, { insideAggregate: true }) : this;
    const resolved = signature.resolve(node.args.map(arg => argChecker.typeOf(arg)));
    if (typeof resolved === 'object') {
      throw new TypeMismatchError(node.fn, resolved.error);
    }
    return resolved;
  }

  visitConditional(node: ConditionalNode): SemanticType {
    expectBoolean(this.typeOf(node.test), 'if', 'condition');
    const then = this.typeOf(node.then);
    const otherwise = this.typeOf(node.else);
    if (then === otherwise) return then;
    if (isNumeric(then) && isNumeric(otherwise)) return widen(then, otherwise);
    if (familyOf(then) === 'temporal' && familyOf(otherwise) === 'temporal') return 'datetime';
    throw new TypeMismatchError('if', `branches have incompatible types ${then} and ${otherwise}`);
  }

  otherwise(node: ExpressionNode): SemanticType {
    throw new TypeMismatchError(node.type, 'not a value expression');
  }

  private checkMembership(node: BinaryNode): SemanticType {
    const left = this.typeOf(node.left);
    if (node.right.type !== 'ValueList') {
      throw new TypeMismatchError(node.operator, 'right operand must be a list of literals');
    }
    if (node.right.items.length === 0) {
      throw new TypeMismatchError(node.operator, 'value list must not be empty');
    }
    for (const item of node.right.items) {
      if (!areEqualityComparable(left, item.literalType)) {
        throw new TypeMismatchError(node.operator, `cannot compare ${left} with ${item.literalType}`);
      }
    }
    return 'boolean';
  }
}

/**
 * Type of an expression against a snapshot
 */
export const typeOf = (node: ExpressionNode, schema: SchemaSnapshot, options?: TypeCheckOptions): SemanticType =>
  new TypeChecker(schema, options).typeOf(node);
