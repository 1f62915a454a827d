import type { SelectQueryNode, TableNode } from '../ast/query.js';
import type {
  AliasRefNode,
  ColumnNode,
  ComparisonNode,
  ConditionNode,
  FunctionNode,
  LiteralNode,
  LogicalNode,
  OperandNode
} from '../ast/expression.js';
import { JoinKind } from '../sql/sql.js';
import { IncompleteQueryError, UnsupportedCapabilityError } from '../errors.js';
import type { FunctionStrategy } from '../functions/types.js';
import { StandardFunctionStrategy } from '../functions/standard-strategy.js';

/**
 * Opening and closing characters wrapped around identifiers
 */
export interface IdentifierQuote {
  open: string;
  close: string;
}

/**
 * Feature flags consulted before a clause is accepted or rendered
 */
export interface DialectCapabilities {
  /** Whether OFFSET may be requested */
  supportsOffset: boolean;
  /** Join kinds the dialect can express */
  supportedJoins: readonly JoinKind[];
}

/**
 * How LIMIT/OFFSET are spelled
 */
export type PaginationStyle = 'limit-offset' | 'offset-fetch';

/**
 * Everything the renderer needs to know about a dialect
 */
export interface DialectRules {
  /** Identifier used for registration and error messages */
  name: string;
  identifierQuote: IdentifierQuote;
  /** Keyword emitted for each join kind */
  joinKeywords: Readonly<Record<JoinKind, string>>;
  capabilities: DialectCapabilities;
  pagination: PaginationStyle;
  /** Whether `\` escapes inside string literals and must itself be doubled */
  backslashEscapes: boolean;
}

export const STANDARD_JOIN_KEYWORDS: Readonly<Record<JoinKind, string>> = {
  INNER: 'INNER JOIN',
  LEFT: 'LEFT JOIN',
  RIGHT: 'RIGHT JOIN',
  FULL: 'FULL JOIN'
};

/**
 * Context for operand compilation.
 * Inside conditions identifiers are emitted unquoted; `qualifyColumns`
 * decides whether columns carry their table.
 */
export interface CompilerContext {
  qualifyColumns: boolean;
}

const UNQUALIFIED: CompilerContext = { qualifyColumns: false };

/**
 * Abstract base class for SQL dialect implementations
 */
export abstract class Dialect {
  private readonly conditionCompilers: Map<string, (node: ConditionNode) => string>;
  private readonly operandCompilers: Map<string, (node: OperandNode, ctx: CompilerContext) => string>;
  protected readonly functionStrategy: FunctionStrategy;

  protected constructor(
    /** Quoting, join spelling and capability rules of this dialect */
    readonly rules: DialectRules,
    functionStrategy?: FunctionStrategy
  ) {
    this.conditionCompilers = new Map();
    this.operandCompilers = new Map();
    this.functionStrategy = functionStrategy || new StandardFunctionStrategy();
    this.registerDefaultOperandCompilers();
    this.registerDefaultConditionCompilers();
  }

  get name(): string {
    return this.rules.name;
  }

  /**
   * Compiles a SELECT query AST to SQL.
   * Pure: the same AST always yields the same string.
   * @throws IncompleteQueryError when the query has no source table
   * @throws UnsupportedCapabilityError when the query uses a clause this dialect cannot express
   */
  compileSelect(ast: SelectQueryNode): string {
    if (!ast.from) {
      throw new IncompleteQueryError();
    }
    for (const join of ast.joins) {
      this.assertJoinSupported(join.kind);
    }
    if (ast.offset !== undefined) {
      this.assertOffsetSupported();
    }
    return this.compileSelectAst(ast, ast.from);
  }

  supportsJoin(kind: JoinKind): boolean {
    return this.rules.capabilities.supportedJoins.includes(kind);
  }

  supportsOffset(): boolean {
    return this.rules.capabilities.supportsOffset;
  }

  assertJoinSupported(kind: JoinKind): void {
    if (!this.supportsJoin(kind)) {
      throw new UnsupportedCapabilityError(`${kind} JOIN`, this.name);
    }
  }

  assertOffsetSupported(): void {
    if (!this.supportsOffset()) {
      throw new UnsupportedCapabilityError('OFFSET', this.name);
    }
  }

  /**
   * Compiles a SELECT whose source is known to be set
   */
  protected abstract compileSelectAst(ast: SelectQueryNode, from: TableNode): string;

  /**
   * Quotes an SQL identifier with the dialect's quote characters
   * @param id - Identifier to quote
   * @returns Quoted identifier
   */
  quoteIdentifier(id: string): string {
    const { open, close } = this.rules.identifierQuote;
    return `${open}${id}${close}`;
  }

  /**
   * Registers a condition compiler for a specific node type
   */
  protected registerConditionCompiler<T extends ConditionNode>(
    type: T['type'],
    compiler: (node: T) => string
  ): void {
    this.conditionCompilers.set(type, node => {
      if (node.type !== type) {
        throw new Error(`Condition compiler for "${type}" received "${node.type}"`);
      }
      return compiler(node as T);
    });
  }

  /**
   * Registers an operand compiler for a specific node type
   */
  protected registerOperandCompiler<T extends OperandNode>(
    type: T['type'],
    compiler: (node: T, ctx: CompilerContext) => string
  ): void {
    this.operandCompilers.set(type, (node, ctx) => {
      if (node.type !== type) {
        throw new Error(`Operand compiler for "${type}" received "${node.type}"`);
      }
      return compiler(node as T, ctx);
    });
  }

  /**
   * Compiles a condition tree
   */
  compileCondition(node: ConditionNode): string {
    const compiler = this.conditionCompilers.get(node.type);
    if (!compiler) {
      throw new Error(`Unsupported condition node type "${node.type}" for ${this.constructor.name}`);
    }
    return compiler(node);
  }

  /**
   * Compiles an operand as it appears inside a condition or function call
   */
  compileOperand(node: OperandNode, ctx: CompilerContext = UNQUALIFIED): string {
    const compiler = this.operandCompilers.get(node.type);
    if (!compiler) {
      throw new Error(`Unsupported operand node type "${node.type}" for ${this.constructor.name}`);
    }
    return compiler(node, ctx);
  }

  /**
   * Renders a literal inline. Strings are single-quoted with embedded quotes doubled,
   * and backslashes doubled too where the dialect treats them as escapes.
   */
  protected compileLiteral(value: LiteralNode['value']): string {
    if (value === null) return 'NULL';
    if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
    if (typeof value === 'number') return String(value);
    const escaped = this.rules.backslashEscapes ? value.replace(/\\/g, '\\\\') : value;
    return `'${escaped.replace(/'/g, "''")}'`;
  }

  private registerDefaultConditionCompilers(): void {
    this.registerConditionCompiler('Comparison', (comparison: ComparisonNode) => {
      // Column-to-column comparisons keep their tables so joins stay unambiguous.
      const ctx: CompilerContext = {
        qualifyColumns: comparison.left.type === 'Column' && comparison.right.type === 'Column'
      };
      const left = this.compileOperand(comparison.left, ctx);
      const right = this.compileOperand(comparison.right, ctx);
      return `${left} ${comparison.operator} ${right}`;
    });

    this.registerConditionCompiler('Logical', (logical: LogicalNode) => {
      const left = this.compileCondition(logical.left);
      const right = this.compileCondition(logical.right);
      const wrapLeft = logical.left.type === 'Logical' && logical.left.operator !== logical.operator;
      const wrapRight = logical.right.type === 'Logical';
      return `${wrapLeft ? `(${left})` : left} ${logical.operator} ${wrapRight ? `(${right})` : right}`;
    });
  }

  private registerDefaultOperandCompilers(): void {
    this.registerOperandCompiler('Literal', (literal: LiteralNode) => this.compileLiteral(literal.value));

    this.registerOperandCompiler('AliasRef', (ref: AliasRefNode) => ref.name);

    this.registerOperandCompiler('Column', (column: ColumnNode, ctx) =>
      ctx.qualifyColumns && column.table ? `${column.table}.${column.name}` : column.name
    );

    this.registerOperandCompiler('Function', (fnNode: FunctionNode, ctx) =>
      this.compileFunctionOperand(fnNode, ctx)
    );
  }

  /**
   * Compiles a function operand, using the dialect's function strategy.
   */
  protected compileFunctionOperand(fnNode: FunctionNode, ctx: CompilerContext): string {
    const compiledArgs = fnNode.args.map(arg => this.compileOperand(arg, ctx));
    const renderer = this.functionStrategy.getRenderer(fnNode.name);
    if (renderer) {
      return renderer({ node: fnNode, compiledArgs });
    }
    return `${fnNode.name}(${compiledArgs.join(',')})`;
  }
}
