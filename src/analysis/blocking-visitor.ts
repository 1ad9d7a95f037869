/**
 * Blocking Visitor
 *
 * Walks a parsed source file and collects findings: calls listed in the
 * operation tables, process-wide global access, module-level mutable
 * bindings and unconditioned loops.
 */

import ts from 'typescript';
import type { BlockingViolation, ViolationKind, ViolationSeverity } from '../types/violations.js';
import type { OperationTables } from '../types/schemas/operation-tables.js';
import { matchOperation } from './operation-tables.js';

const GLOBAL_OBJECTS = new Set(['globalThis', 'global']);
const MUTABLE_CONTAINERS = new Set(['Map', 'Set', 'WeakMap', 'WeakSet']);

/**
 * Dotted path of a callee, e.g. `fs.promises.readFile`.
 *
 * Roots that are not plain names (`require('fs')`, `this`, literals)
 * contribute no segment.
 */
export function calleePath(expression: ts.Expression): string[] {
  if (ts.isIdentifier(expression)) {
    return [expression.text];
  }
  if (ts.isPropertyAccessExpression(expression)) {
    return [...calleePath(expression.expression), expression.name.text];
  }
  if (ts.isElementAccessExpression(expression) && ts.isStringLiteralLike(expression.argumentExpression)) {
    return [...calleePath(expression.expression), expression.argumentExpression.text];
  }
  if (
    ts.isParenthesizedExpression(expression) ||
    ts.isNonNullExpression(expression) ||
    ts.isAsExpression(expression)
  ) {
    return calleePath(expression.expression);
  }
  return [];
}

function unwrapExpression(expression: ts.Expression): ts.Expression {
  if (
    ts.isParenthesizedExpression(expression) ||
    ts.isAsExpression(expression) ||
    ts.isSatisfiesExpression(expression) ||
    ts.isTypeAssertionExpression(expression)
  ) {
    return unwrapExpression(expression.expression);
  }
  return expression;
}

function isFunctionBoundary(node: ts.Node): boolean {
  return ts.isFunctionLike(node) || ts.isClassLike(node);
}

function hasModifier(node: ts.HasModifiers, kind: ts.SyntaxKind): boolean {
  return ts.getModifiers(node)?.some((modifier) => modifier.kind === kind) ?? false;
}

/**
 * `true`, or a numeric literal other than zero
 */
function isConstantTruthy(condition: ts.Expression): boolean {
  const expression = unwrapExpression(condition);
  if (expression.kind === ts.SyntaxKind.TrueKeyword) {
    return true;
  }
  return ts.isNumericLiteral(expression) && Number(expression.text) !== 0;
}

/**
 * Whether control can leave `loop` from inside its body: a break that
 * targets it, a labeled break or continue aimed outside it, a return or
 * throw, or a point that yields to the event loop. Nested functions and
 * classes are not searched.
 */
function loopHasExit(loop: ts.IterationStatement): boolean {
  const ownLabel = ts.isLabeledStatement(loop.parent) ? loop.parent.label.text : undefined;

  const search = (node: ts.Node, breakTargetsLoop: boolean, innerLabels: ReadonlySet<string>): boolean => {
    if (isFunctionBoundary(node)) {
      return false;
    }
    if (
      ts.isReturnStatement(node) ||
      ts.isThrowStatement(node) ||
      ts.isAwaitExpression(node) ||
      ts.isYieldExpression(node)
    ) {
      return true;
    }
    if (ts.isForOfStatement(node) && node.awaitModifier) {
      return true;
    }
    if (ts.isBreakStatement(node)) {
      return node.label ? !innerLabels.has(node.label.text) : breakTargetsLoop;
    }
    if (ts.isContinueStatement(node)) {
      return node.label !== undefined && node.label.text !== ownLabel && !innerLabels.has(node.label.text);
    }

    // An unlabeled break inside a nested loop or switch exits that construct
    const nestedTargetsLoop =
      breakTargetsLoop && !ts.isIterationStatement(node, false) && !ts.isSwitchStatement(node);
    const nestedLabels = ts.isLabeledStatement(node)
      ? new Set([...innerLabels, node.label.text])
      : innerLabels;
    return ts.forEachChild(node, (child) => search(child, nestedTargetsLoop, nestedLabels)) ?? false;
  };

  return search(loop.statement, true, new Set<string>());
}

function loopKeyword(loop: ts.IterationStatement): string {
  if (ts.isDoStatement(loop)) {
    return 'do';
  }
  return ts.isForStatement(loop) ? 'for' : 'while';
}

function isUnconditionedLoop(node: ts.Node): node is ts.IterationStatement {
  if (ts.isWhileStatement(node) || ts.isDoStatement(node)) {
    return isConstantTruthy(node.expression);
  }
  if (ts.isForStatement(node)) {
    return node.condition === undefined || isConstantTruthy(node.condition);
  }
  return false;
}

function isEmptyMutableContainer(initializer: ts.Expression | undefined): boolean {
  if (!initializer) {
    return false;
  }
  const expression = unwrapExpression(initializer);

  if (ts.isArrayLiteralExpression(expression)) {
    return expression.elements.length === 0;
  }
  if (ts.isObjectLiteralExpression(expression)) {
    return expression.properties.length === 0;
  }
  if (ts.isNewExpression(expression) && ts.isIdentifier(expression.expression)) {
    return MUTABLE_CONTAINERS.has(expression.expression.text);
  }
  return false;
}

/**
 * Collects violations for one source file
 */
export class BlockingVisitor {
  private readonly violations: BlockingViolation[] = [];

  constructor(
    private readonly sourceFile: ts.SourceFile,
    private readonly context: string,
    private readonly tables: OperationTables
  ) {}

  collect(): BlockingViolation[] {
    this.checkModuleBindings();
    this.visit(this.sourceFile);
    return this.violations;
  }

  private visit(node: ts.Node): void {
    if (ts.isCallExpression(node)) {
      this.checkCall(node);
    } else if (ts.isPropertyAccessExpression(node) || ts.isElementAccessExpression(node)) {
      this.checkGlobalAccess(node);
    } else if (ts.isPropertyDeclaration(node)) {
      this.checkStaticField(node);
    } else if (isUnconditionedLoop(node) && !loopHasExit(node)) {
      const keyword = loopKeyword(node);
      this.report(node, 'UnboundedLoop', 'error', keyword, {
        message: `Unconditioned ${keyword} loop never exits or yields to the event loop`,
        suggestion: 'Add an exit condition, a break, or an await inside the loop body',
      });
    }

    ts.forEachChild(node, (child) => this.visit(child));
  }

  private checkCall(node: ts.CallExpression): void {
    const segments = calleePath(node.expression);
    const match = matchOperation(this.tables, segments);
    if (!match) {
      return;
    }

    const symbol = segments.join('.');
    if (match.table === 'blocking') {
      this.report(node, 'BlockingCall', 'error', symbol, {
        message: `Blocking call to ${symbol} halts the event loop`,
        suggestion: match.entry.suggestion,
      });
    } else {
      this.report(node, 'UnsafeCall', 'warning', symbol, {
        message: `${symbol} changes state shared by every request`,
        suggestion: match.entry.suggestion,
      });
    }
  }

  private checkGlobalAccess(node: ts.PropertyAccessExpression | ts.ElementAccessExpression): void {
    const target = node.expression;
    if (!ts.isIdentifier(target)) {
      return;
    }

    if (GLOBAL_OBJECTS.has(target.text)) {
      const symbol = ts.isPropertyAccessExpression(node)
        ? `${target.text}.${node.name.text}`
        : `${target.text}[]`;
      this.report(node, 'GlobalStateAccess', 'warning', symbol, {
        message: `Access to process-wide global ${symbol}`,
        suggestion: 'Read from the request object or an injected dependency instead of ambient state',
      });
      return;
    }

    if (target.text === 'process' && ts.isPropertyAccessExpression(node) && node.name.text === 'env') {
      this.report(node, 'GlobalStateAccess', 'warning', 'process.env', {
        message: 'Access to process-wide environment process.env',
        suggestion: 'Read configuration once at startup and pass it down explicitly',
      });
    }
  }

  private checkModuleBindings(): void {
    for (const statement of this.sourceFile.statements) {
      if (!ts.isVariableStatement(statement) || hasModifier(statement, ts.SyntaxKind.DeclareKeyword)) {
        continue;
      }

      const isConst = (statement.declarationList.flags & ts.NodeFlags.Const) !== 0;
      for (const declaration of statement.declarationList.declarations) {
        if (isConst && !isEmptyMutableContainer(declaration.initializer)) {
          continue;
        }

        const name = declaration.name.getText(this.sourceFile);
        this.report(declaration, 'StaticMutableAccess', 'warning', name, {
          message: isConst
            ? `Module-level container ${name} is shared by every request`
            : `Module-level mutable binding ${name} persists across requests`,
          suggestion: 'Move the state into an owned, bounded container (such as a MemoryCache) passed by reference',
        });
      }
    }
  }

  private checkStaticField(node: ts.PropertyDeclaration): void {
    if (
      !hasModifier(node, ts.SyntaxKind.StaticKeyword) ||
      hasModifier(node, ts.SyntaxKind.ReadonlyKeyword)
    ) {
      return;
    }

    const className = node.parent.name?.text ?? '<anonymous>';
    const symbol = `${className}.${node.name.getText(this.sourceFile)}`;
    this.report(node, 'StaticMutableAccess', 'warning', symbol, {
      message: `Static field ${symbol} persists across requests`,
      suggestion: 'Mark the field readonly or keep the state on an instance owned by the request',
    });
  }

  private report(
    node: ts.Node,
    kind: ViolationKind,
    severity: ViolationSeverity,
    symbol: string,
    text: { message: string; suggestion: string }
  ): void {
    const position = this.sourceFile.getLineAndCharacterOfPosition(node.getStart(this.sourceFile));

    this.violations.push({
      kind,
      severity,
      symbol,
      location: {
        type: 'source',
        file: this.context,
        line: position.line + 1,
        column: position.character + 1,
      },
      message: text.message,
      suggestion: text.suggestion,
    });
  }
}
