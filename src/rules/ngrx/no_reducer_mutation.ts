import { z } from 'zod';
import { Node, SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { getRootIdentifier, isCallNamed } from '../ast_helpers.js';

const MUTATING_METHODS = ['push', 'pop', 'shift', 'unshift', 'splice', 'sort', 'reverse', 'fill', 'copyWithin'];

function isAccessRootedAt(node: Node, root: string): boolean {
  return (
    (Node.isPropertyAccessExpression(node) || Node.isElementAccessExpression(node)) &&
    getRootIdentifier(node) === root
  );
}

function isAssignmentOperator(kind: SyntaxKind): boolean {
  return kind >= SyntaxKind.FirstAssignment && kind <= SyntaxKind.LastAssignment;
}

function findMutations(handler: Node, stateName: string): RuleFinding[] {
  const findings: RuleFinding[] = [];

  handler.forEachDescendant((node) => {
    if (Node.isBinaryExpression(node) && isAssignmentOperator(node.getOperatorToken().getKind())) {
      const target = node.getLeft();
      if (isAccessRootedAt(target, stateName)) {
        findings.push({
          node,
          message: `Reducer mutates "${target.getText()}"`,
          suggestion: 'Return a new state object with the spread operator instead',
        });
      }
      return;
    }

    if ((Node.isPostfixUnaryExpression(node) || Node.isPrefixUnaryExpression(node)) && isAccessRootedAt(node.getOperand(), stateName)) {
      const operator = node.getOperatorToken();
      if (operator === SyntaxKind.PlusPlusToken || operator === SyntaxKind.MinusMinusToken) {
        findings.push({
          node,
          message: `Reducer mutates "${node.getOperand().getText()}"`,
          suggestion: 'Return a new state object with the spread operator instead',
        });
      }
      return;
    }

    if (Node.isDeleteExpression(node) && isAccessRootedAt(node.getExpression(), stateName)) {
      findings.push({
        node,
        message: `Reducer deletes "${node.getExpression().getText()}"`,
        suggestion: 'Omit the key while building a new state object instead',
      });
      return;
    }

    if (isCallNamed(node, MUTATING_METHODS)) {
      const callee = node.getExpression();
      if (!Node.isPropertyAccessExpression(callee)) return;
      const receiver = callee.getExpression();
      if (getRootIdentifier(receiver) !== stateName) return;
      findings.push({
        node,
        message: `Reducer mutates "${receiver.getText()}" with ${callee.getName()}()`,
        suggestion: 'Build a new array, e.g. [...items, item] or items.filter(...)',
      });
    }
  });

  return findings;
}

export const noReducerMutationRule = defineRule({
  id: 'ngrx/no-reducer-mutation',
  category: 'ngrx',
  name: 'Reducers never mutate state',
  description: 'on() handlers inside createReducer return new state instead of changing the state they receive.',
  rationale:
    'Selectors and OnPush change detection compare state by reference; a mutated state object keeps its reference, so nothing downstream notices the change.',
  avoid: `export const heroReducer = createReducer(
  initialState,
  on(heroAdded, (state, { hero }) => {
    state.heroes.push(hero);
    return state;
  }),
);`,
  prefer: `export const heroReducer = createReducer(
  initialState,
  on(heroAdded, (state, { hero }) => ({ ...state, heroes: [...state.heroes, hero] })),
);`,
  defaultSeverity: 'error',
  optionsSchema: z.object({}).strict().default({}),
  check(ctx) {
    const findings: RuleFinding[] = [];

    for (const reducer of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression)) {
      if (!isCallNamed(reducer, ['createReducer'])) continue;
      for (const on of reducer.getArguments()) {
        if (!isCallNamed(on, ['on'])) continue;
        const args = on.getArguments();
        const handler = args[args.length - 1];
        if (!Node.isArrowFunction(handler) && !Node.isFunctionExpression(handler)) continue;
        const stateParam = handler.getParameters()[0]?.getNameNode();
        if (!stateParam || !Node.isIdentifier(stateParam)) continue;
        findings.push(...findMutations(handler, stateParam.getText()));
      }
    }

    return findings;
  },
});
