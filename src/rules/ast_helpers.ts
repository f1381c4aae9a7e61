/**
 * @fileoverview Syntax helpers shared by the built-in rules
 *
 * Rules are syntactic: no type checker is available, so observables, subjects
 * and framework classes are recognized by decorator names, type annotations
 * and well-known call shapes.
 */

import {
  Node,
  SyntaxKind,
  type CallExpression,
  type ClassDeclaration,
  type PropertyDeclaration,
  type SourceFile,
} from 'ts-morph';

export const SUBJECT_TYPES = ['Subject', 'BehaviorSubject', 'ReplaySubject', 'AsyncSubject'] as const;

export const OBSERVABLE_TYPES = ['Observable', 'ConnectableObservable', ...SUBJECT_TYPES] as const;

/** RxJS creation functions that return an Observable */
export const CREATION_FUNCTIONS = [
  'of',
  'from',
  'interval',
  'timer',
  'fromEvent',
  'combineLatest',
  'merge',
  'concat',
  'forkJoin',
  'zip',
  'defer',
  'race',
  'throwError',
] as const;

export function hasDecorator(cls: ClassDeclaration, names: readonly string[]): boolean {
  return cls.getDecorators().some((decorator) => names.includes(decorator.getName()));
}

export function getClassName(cls: ClassDeclaration): string {
  return cls.getName() ?? '<anonymous>';
}

/**
 * `foo(...)` → `foo`, `a.b.foo(...)` → `foo`, anything else → undefined.
 */
export function getCalleeName(call: CallExpression): string | undefined {
  const callee = call.getExpression();
  if (Node.isIdentifier(callee)) {
    return callee.getText();
  }
  if (Node.isPropertyAccessExpression(callee)) {
    return callee.getName();
  }
  return undefined;
}

export function isCallNamed(node: Node, names: readonly string[]): node is CallExpression {
  if (!Node.isCallExpression(node)) return false;
  const name = getCalleeName(node);
  return name !== undefined && names.includes(name);
}

/**
 * `receiver.method(...)`: returns the receiver when the call is a method call
 * with the given name.
 */
export function getMethodReceiver(call: CallExpression, method: string): Node | undefined {
  const callee = call.getExpression();
  if (Node.isPropertyAccessExpression(callee) && callee.getName() === method) {
    return callee.getExpression();
  }
  return undefined;
}

export function isSubscribeCall(node: Node): node is CallExpression {
  return Node.isCallExpression(node) && getMethodReceiver(node, 'subscribe') !== undefined;
}

/**
 * Walks `a.b[c].d` down to `a`. Returns undefined when the chain does not
 * end in a plain identifier.
 */
export function getRootIdentifier(expression: Node): string | undefined {
  let current: Node = expression;
  while (Node.isPropertyAccessExpression(current) || Node.isElementAccessExpression(current)) {
    current = current.getExpression();
  }
  if (Node.isParenthesizedExpression(current)) {
    return getRootIdentifier(current.getExpression());
  }
  return Node.isIdentifier(current) ? current.getText() : undefined;
}

export function getStringLiteralValue(node: Node | undefined): string | undefined {
  if (!node) return undefined;
  if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
    return node.getLiteralValue();
  }
  return undefined;
}

export function isNonPublicMember(prop: PropertyDeclaration): boolean {
  return (
    prop.hasModifier(SyntaxKind.PrivateKeyword) ||
    prop.hasModifier(SyntaxKind.ProtectedKeyword) ||
    prop.getName().startsWith('#')
  );
}

function typeNameOf(typeText: string): string {
  const generic = typeText.indexOf('<');
  const base = (generic === -1 ? typeText : typeText.slice(0, generic)).trim();
  const dot = base.lastIndexOf('.');
  return dot === -1 ? base : base.slice(dot + 1);
}

export function isSubjectTypeText(typeText: string): boolean {
  const name = typeNameOf(typeText);
  return SUBJECT_TYPES.some((candidate) => candidate === name);
}

export function isObservableTypeText(typeText: string): boolean {
  const name = typeNameOf(typeText);
  return OBSERVABLE_TYPES.some((candidate) => candidate === name);
}

export function isSubjectConstruction(node: Node | undefined): boolean {
  if (!node || !Node.isNewExpression(node)) return false;
  return isSubjectTypeText(node.getExpression().getText());
}

const STORE_RECEIVER = /store$/i;

/** `this.store`, `heroStore` and the like: the NgRx Store, itself an Observable */
export function isStoreReceiver(node: Node): boolean {
  return STORE_RECEIVER.test(node.getText());
}

function isRxjsModule(specifier: string): boolean {
  return specifier === 'rxjs' || specifier.startsWith('rxjs/');
}

export type ImportOrigin =
  | { kind: 'named'; module: string; importedName: string }
  | { kind: 'namespace' | 'default'; module: string };

/**
 * Where a file-level name comes from, or `undefined` when no import binds it
 * (a global, a local declaration, or a snippet written without imports).
 */
export function resolveImport(sourceFile: SourceFile, localName: string): ImportOrigin | undefined {
  for (const declaration of sourceFile.getImportDeclarations()) {
    const module = declaration.getModuleSpecifierValue();
    if (declaration.getDefaultImport()?.getText() === localName) return { kind: 'default', module };
    if (declaration.getNamespaceImport()?.getText() === localName) return { kind: 'namespace', module };
    for (const named of declaration.getNamedImports()) {
      const local = named.getAliasNode()?.getText() ?? named.getName();
      if (local === localName) return { kind: 'named', module, importedName: named.getName() };
    }
  }
  return undefined;
}

function isCreationFunctionName(name: string): boolean {
  return CREATION_FUNCTIONS.some((candidate) => candidate === name);
}

/**
 * An RxJS creation function called by name. A name imported from any module
 * other than rxjs (lodash's `merge`, say) does not count; an unbound name does.
 */
function isCreationCall(call: CallExpression): boolean {
  const callee = call.getExpression();
  if (Node.isIdentifier(callee)) {
    const origin = resolveImport(call.getSourceFile(), callee.getText());
    if (!origin) return isCreationFunctionName(callee.getText());
    return origin.kind === 'named' && isRxjsModule(origin.module) && isCreationFunctionName(origin.importedName);
  }
  if (Node.isPropertyAccessExpression(callee)) {
    const namespace = callee.getExpression();
    if (!Node.isIdentifier(namespace)) return false;
    const origin = resolveImport(call.getSourceFile(), namespace.getText());
    return origin?.kind === 'namespace' && isRxjsModule(origin.module) && isCreationFunctionName(callee.getName());
  }
  return false;
}

function isRxjsOperatorCall(node: Node): boolean {
  if (!Node.isCallExpression(node)) return false;
  const callee = node.getExpression();
  if (!Node.isIdentifier(callee)) return false;
  const origin = resolveImport(node.getSourceFile(), callee.getText());
  return origin !== undefined && isRxjsModule(origin.module);
}

function isObservableReceiver(receiver: Node): boolean {
  if (Node.isIdentifier(receiver)) return receiver.getText().endsWith('$') || isStoreReceiver(receiver);
  if (Node.isPropertyAccessExpression(receiver)) {
    return receiver.getName().endsWith('$') || isStoreReceiver(receiver);
  }
  return isObservableInitializer(receiver);
}

/**
 * Recognizes initializers that evidently produce an Observable: a subject or
 * Observable construction, an RxJS creation function, `asObservable()`, a
 * store `select()`, or `pipe()` on an observable receiver or through RxJS
 * operators.
 */
export function isObservableInitializer(node: Node | undefined): boolean {
  if (!node) return false;
  if (isSubjectConstruction(node)) return true;
  if (Node.isNewExpression(node)) {
    return typeNameOf(node.getExpression().getText()) === 'Observable';
  }
  if (!Node.isCallExpression(node)) return false;
  if (isCreationCall(node)) return true;
  const callee = node.getExpression();
  if (!Node.isPropertyAccessExpression(callee)) return false;
  const receiver = callee.getExpression();
  switch (callee.getName()) {
    case 'asObservable':
      return true;
    case 'select':
      return isStoreReceiver(receiver);
    case 'pipe':
      return isObservableReceiver(receiver) || node.getArguments().some(isRxjsOperatorCall);
    default:
      return false;
  }
}

/**
 * True when `inner` lies inside one of the call's argument expressions.
 */
export function isWithinArguments(call: CallExpression, inner: Node): boolean {
  return call
    .getArguments()
    .some((arg) => arg.getStart() <= inner.getStart() && inner.getEnd() <= arg.getEnd());
}

export function isFunctionLike(node: Node | undefined): boolean {
  return node !== undefined && (Node.isArrowFunction(node) || Node.isFunctionExpression(node));
}
