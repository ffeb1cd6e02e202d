import type {
  AliasNode,
  BinaryNode,
  ColumnRefNode,
  ConditionalNode,
  ExpressionNode,
  FunctionCallNode,
  LiteralNode,
  OrderSpecNode,
  UnaryNode,
  ValueListNode
} from './expression-nodes.js';

/**
 * Visitor for value expressions. A missing method falls back to `otherwise`;
 * with neither present, dispatch fails through the `unsupported` callback.
 * GroupSpec and JoinSpec are clause payloads and always take that fallback.
 */
export interface ExpressionVisitor<R> {
  visitLiteral?(node: LiteralNode): R;
  visitColumnRef?(node: ColumnRefNode): R;
  visitUnary?(node: UnaryNode): R;
  visitBinary?(node: BinaryNode): R;
  visitValueList?(node: ValueListNode): R;
  visitFunctionCall?(node: FunctionCallNode): R;
  visitAlias?(node: AliasNode): R;
  visitConditional?(node: ConditionalNode): R;
  visitOrderSpec?(node: OrderSpecNode): R;
  otherwise?(node: ExpressionNode): R;
}

const assertNever = (node: never): never => {
  throw new Error(`Unexpected expression node ${JSON.stringify(node)}`);
};

const unsupportedExpression = (node: ExpressionNode): never => {
  throw new Error(`Unsupported expression type "${node.type}"`);
};

/**
 * Dispatches an expression node to the visitor
 * @param node - Expression node to visit
 * @param visitor - Visitor implementation
 * @param unsupported - Called when the visitor has no method for the node
 */
export const visitExpression = <R>(
  node: ExpressionNode,
  visitor: ExpressionVisitor<R>,
  unsupported: (node: ExpressionNode) => never = unsupportedExpression
): R => {
  switch (node.type) {
    case 'Literal':
      if (visitor.visitLiteral) return visitor.visitLiteral(node);
      break;
    case 'ColumnRef':
      if (visitor.visitColumnRef) return visitor.visitColumnRef(node);
      break;
    case 'Unary':
      if (visitor.visitUnary) return visitor.visitUnary(node);
      break;
    case 'Binary':
      if (visitor.visitBinary) return visitor.visitBinary(node);
      break;
    case 'ValueList':
      if (visitor.visitValueList) return visitor.visitValueList(node);
      break;
    case 'FunctionCall':
      if (visitor.visitFunctionCall) return visitor.visitFunctionCall(node);
      break;
    case 'Alias':
      if (visitor.visitAlias) return visitor.visitAlias(node);
      break;
    case 'Conditional':
      if (visitor.visitConditional) return visitor.visitConditional(node);
      break;
    case 'OrderSpec':
      if (visitor.visitOrderSpec) return visitor.visitOrderSpec(node);
      break;
    case 'GroupSpec':
    case 'JoinSpec':
      break;
    default:
      return assertNever(node);
  }
  if (visitor.otherwise) return visitor.otherwise(node);
  return unsupported(node);
};

/**
 * Direct children of a node, in evaluation order
 */
export const childExpressions = (node: ExpressionNode): ReadonlyArray<ExpressionNode> => {
  switch (node.type) {
    case 'Literal':
    case 'ColumnRef':
      return [];
    case 'Unary':
      return [node.operand];
    case 'Binary':
      return [node.left, node.right];
    case 'ValueList':
      return node.items;
    case 'FunctionCall':
      return node.args;
    case 'Alias':
      return [node.expression];
    case 'Conditional':
      return [node.test, node.then, node.else];
    case 'OrderSpec':
      return [node.expression];
    case 'GroupSpec':
      return [...node.keys, ...node.selections, ...(node.having ? [node.having] : [])];
    case 'JoinSpec':
      return [node.condition];
  }
};

/**
 * Names of every column referenced anywhere below the node
 */
export const referencedColumns = (node: ExpressionNode): string[] => {
  if (node.type === 'ColumnRef') return [node.name];
  return childExpressions(node).flatMap(referencedColumns);
};
