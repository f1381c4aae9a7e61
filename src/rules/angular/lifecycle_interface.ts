import { z } from 'zod';
import { SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { getClassName } from '../ast_helpers.js';

/** Lifecycle hook method → interface exported by @angular/core */
export const LIFECYCLE_HOOKS: Readonly<Record<string, string>> = {
  ngOnChanges: 'OnChanges',
  ngOnInit: 'OnInit',
  ngDoCheck: 'DoCheck',
  ngAfterContentInit: 'AfterContentInit',
  ngAfterContentChecked: 'AfterContentChecked',
  ngAfterViewInit: 'AfterViewInit',
  ngAfterViewChecked: 'AfterViewChecked',
  ngOnDestroy: 'OnDestroy',
};

export const lifecycleInterfaceRule = defineRule({
  id: 'angular/lifecycle-interface',
  category: 'angular',
  name: 'Implement lifecycle hook interfaces',
  description: 'A class that defines a lifecycle hook method declares the matching interface.',
  rationale:
    'The interface makes the compiler check the hook signature, so a misspelled or mistyped hook fails the build instead of silently never running.',
  avoid: `export class HeroButtonComponent {
  ngOnInit() {
    this.load();
  }
}`,
  prefer: `export class HeroButtonComponent implements OnInit {
  ngOnInit() {
    this.load();
  }
}`,
  defaultSeverity: 'warning',
  optionsSchema: z.object({}).strict().default({}),
  check(ctx) {
    const findings: RuleFinding[] = [];

    for (const cls of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.ClassDeclaration)) {
      const implemented = new Set(
        cls.getImplements().map((clause) => {
          const text = clause.getExpression().getText();
          return text.slice(text.lastIndexOf('.') + 1);
        }),
      );

      for (const method of cls.getMethods()) {
        const hook = method.getName();
        const expected = Object.prototype.hasOwnProperty.call(LIFECYCLE_HOOKS, hook) ? LIFECYCLE_HOOKS[hook] : undefined;
        if (!expected || implemented.has(expected)) continue;
        findings.push({
          node: method.getNameNode(),
          message: `Class "${getClassName(cls)}" defines ${hook} but does not implement ${expected}`,
          suggestion: `Add "implements ${expected}" to the class declaration`,
        });
      }
    }

    return findings;
  },
});
