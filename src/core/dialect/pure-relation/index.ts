import { Dialect } from '../abstract.js';
import type { FromClause } from '../../ast/clause-nodes.js';
import type { ClauseVisitor } from '../../ast/clause-visitor.js';
import type { ExpressionVisitor } from '../../ast/expression-visitor.js';
import type { BinaryNode, ExpressionNode, LiteralNode, UnaryNode, ValueListNode } from '../../ast/expression-nodes.js';
import {
  ARITHMETIC_OPERATORS,
  BinaryOperator,
  COMPARISON_OPERATORS,
  JOIN_KINDS,
  JoinKind,
  UNARY_OPERATORS
} from '../../algebra/operators.js';
import type { FunctionStrategy } from '../../functions/types.js';
import { GroupByCompiler } from '../base/groupby-compiler.js';
import { JoinCompiler } from '../base/join-compiler.js';
import { OrderByCompiler, OrderByStyle } from '../base/orderby-compiler.js';
import { PaginationStrategy, TakeDropPagination } from '../base/pagination-strategy.js';

export interface PureRelationOptions {
  /**
   * `direction` writes only `asc`/`desc` per sort entry; `term` writes `<expr> asc`.
   * @default 'direction'
   */
  orderBy?: OrderByStyle;
  functionStrategy?: FunctionStrategy;
  paginationStrategy?: PaginationStrategy;
}

const BINARY_TOKENS: Partial<Record<BinaryOperator, string>> = {
  '=': '==',
  '!=': '!=',
  '>': '>',
  '>=': '>=',
  '<': '<',
  '<=': '<=',
  LIKE: 'like',
  AND: '&&',
  OR: '||',
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  '&': '&',
  '|': '|'
};

const JOIN_KIND_TOKENS: Record<JoinKind, string> = {
  [JOIN_KINDS.INNER]: 'INNER',
  [JOIN_KINDS.LEFT]: 'LEFT_OUTER'
};

const escapeString = (value: string): string => value.replace(/[\\']/g, match => `\\${match}`);

const suffix = (op: string, args: string): string => `\n->${op}(${args})`;

/**
 * Plain decimal text with at least one fractional digit: `2.0`, `0.0000001`
 */
export const formatDouble = (value: number): string => {
  const text = String(Math.abs(value));
  const sign = value < 0 ? '-' : '';
  const [mantissa = text, exponentText] = text.split('e');
  if (exponentText === undefined) {
    return `${sign}${mantissa.includes('.') ? mantissa : `${mantissa}.0`}`;
  }
  const [whole = '', fraction = ''] = mantissa.split('.');
  const digits = whole + fraction;
  const point = whole.length + Number(exponentText);
  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}.0`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
};

/**
 * Renders pipelines as pure-relation text:
 * `db.table` followed by one `\n->op(args)` line per clause.
 */
export class PureRelationDialect extends Dialect {
  readonly name = 'pure-relation';

  private readonly orderByStyle: OrderByStyle;
  private readonly pagination: PaginationStrategy;

  public constructor(options: PureRelationOptions = {}) {
    super(options.functionStrategy);
    this.orderByStyle = options.orderBy ?? 'direction';
    this.pagination = options.paginationStrategy ?? new TakeDropPagination();
  }

  protected compileFrom(from: FromClause): string {
    return `${from.database}.${from.table}`;
  }

  protected readonly clauseCompilers: ClauseVisitor<string> = {
    visitSelect: clause => suffix('project', this.compileList(clause.columns)),
    visitExtend: clause => suffix('extend', this.compileList(clause.expressions)),
    visitRename: clause => suffix('rename', this.compileList(clause.renames)),
    visitFilter: clause => suffix('filter', this.compileExpression(clause.predicate)),
    visitGroupBy: clause => suffix('groupBy', GroupByCompiler.compileGroupBy(clause.spec, term => this.compileExpression(term))),
    visitOrderBy: clause =>
      suffix('sort', OrderByCompiler.compileOrdering(clause.ordering, term => this.compileExpression(term), this.orderByStyle)),
    visitLimit: clause => `\n->${this.pagination.compileLimit(clause.value)}`,
    visitOffset: clause => `\n->${this.pagination.compileOffset(clause.value)}`,
    visitJoin: clause =>
      suffix(
        'join',
        JoinCompiler.compileJoin(
          clause,
          from => this.compileFrom(from),
          expr => this.compileExpression(expr),
          kind => JOIN_KIND_TOKENS[kind]
        )
      )
  };

  protected readonly expressionCompilers: ExpressionVisitor<string> = {
    visitLiteral: node => this.compileLiteral(node),
    visitColumnRef: node => node.name,
    visitUnary: node => this.compileUnary(node),
    visitBinary: node => this.compileBinary(node),
    visitValueList: node => this.compileValueList(node),
    visitFunctionCall: node => {
      const renderer = this.functionStrategy.getRenderer(node.fn);
      if (!renderer) {
        return this.unsupported(node.fn);
      }
      return renderer({ node, compiledArgs: node.args.map(arg => this.compileExpression(arg)) });
    },
    visitAlias: node => `${this.compileExpression(node.expression)} as ${node.name}`,
    visitConditional: node =>
      `if(${this.compileExpression(node.test)}, ${this.compileExpression(node.then)}, ${this.compileExpression(node.else)})`,
    visitOrderSpec: node => `${this.compileExpression(node.expression)} ${node.direction}`
  };

  private compileList(nodes: ReadonlyArray<ExpressionNode>): string {
    return `[${nodes.map(node => this.compileExpression(node)).join(', ')}]`;
  }

  protected compileLiteral(node: LiteralNode): string {
    switch (node.literalType) {
      case 'integer':
      case 'long':
        return String(node.value);
      case 'double':
        return formatDouble(node.value);
      case 'string':
        return `'${escapeString(node.value)}'`;
      case 'boolean':
        return node.value ? 'true' : 'false';
      case 'date':
        return `%${node.value}%`;
    }
  }

  protected compileUnary(node: UnaryNode): string {
    const operand = this.compileExpression(node.operand);
    switch (node.operator) {
      case UNARY_OPERATORS.NOT:
        return `not(${operand})`;
      case UNARY_OPERATORS.IS_NULL:
        return `(${operand} is null)`;
      case UNARY_OPERATORS.IS_NOT_NULL:
        return `(${operand} is not null)`;
    }
  }

  protected compileBinary(node: BinaryNode): string {
    const left = this.compileExpression(node.left);
    const right = this.compileExpression(node.right);
    switch (node.operator) {
      case ARITHMETIC_OPERATORS.MOD:
        return `mod(${left}, ${right})`;
      case ARITHMETIC_OPERATORS.POW:
        return `pow(${left}, ${right})`;
      case COMPARISON_OPERATORS.IN:
        return `(${left} in ${right})`;
      case COMPARISON_OPERATORS.NOT_IN:
        return `(${left} notIn ${right})`;
    }
    const token = BINARY_TOKENS[node.operator];
    if (!token) {
      return this.unsupported(node.operator);
    }
    return `(${left} ${token} ${right})`;
  }

  protected compileValueList(node: ValueListNode): string {
    return `[${node.items.map(item => this.compileLiteral(item)).join(', ')}]`;
  }
}
