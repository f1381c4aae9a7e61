import { describe, it, expect } from 'vitest';
import { messagesOf, runRule } from '../../__tests__/helpers/rules.js';
import { finnishNotationRule } from '../rxjs/finnish_notation.js';
import { noExposedSubjectRule } from '../rxjs/no_exposed_subject.js';
import { noNestedSubscribeRule } from '../rxjs/no_nested_subscribe.js';
import { takeUntilLastRule } from '../rxjs/takeuntil_last.js';

describe('rxjs/finnish-notation', () => {
  it('reports observable variables, properties and parameters without the $ suffix', () => {
    const code = `const ticks = interval(1000);
const count$ = of(1);
const total: number = 3;
let stream: Observable<number>;
export class HeroListComponent {
  heroes: Observable<Hero[]>;
  readonly query$ = this.route.queryParams.pipe(map((params) => params));
  private readonly destroy = new Subject<void>();
  constructor(private readonly events: rx.Observable<Event>) {}
  load(source: Observable<number>, id: string) {}
}`;

    expect(messagesOf(finnishNotationRule, code)).toEqual([
      'Observable variable "ticks" should end with "$"',
      'Observable variable "stream" should end with "$"',
      'Observable property "heroes" should end with "$"',
      'Observable property "destroy" should end with "$"',
      'Observable parameter "events" should end with "$"',
      'Observable parameter "source" should end with "$"',
    ]);
  });

  it('suggests the suffixed name at the identifier position', () => {
    expect(runRule(finnishNotationRule, 'const clicks = fromEvent(document, "click");')).toEqual([
      {
        line: 1,
        column: 7,
        message: 'Observable variable "clicks" should end with "$"',
        suggestion: 'Rename to "clicks$"',
      },
    ]);
  });

  it('ignores same-named calls from other libraries', () => {
    const code = `import { merge } from 'lodash-es';
import { createReadStream, createWriteStream } from 'node:fs';
import * as d3 from 'd3';
const settings = merge(defaults, overrides);
const copy = createReadStream('a').pipe(createWriteStream('b'));
const body = d3.select('body');`;

    expect(messagesOf(finnishNotationRule, code)).toEqual([]);
  });

  it('follows rxjs imports through aliases and namespaces', () => {
    const code = `import { merge as mergeStreams, map } from 'rxjs';
import * as rx from 'rxjs';
const both = mergeStreams(a$, b$);
const ticks = rx.timer(10);
const names = this.http.get(url).pipe(map((hero) => hero.name));
const heroes = this.store.select(selectHeroes);
const total = rx.lastValueFrom(both);`;

    expect(messagesOf(finnishNotationRule, code)).toEqual([
      'Observable variable "both" should end with "$"',
      'Observable variable "ticks" should end with "$"',
      'Observable variable "names" should end with "$"',
      'Observable variable "heroes" should end with "$"',
    ]);
  });
});

describe('rxjs/no-exposed-subject', () => {
  it('reports public subjects found by type or construction', () => {
    const code = `export class HeroStore {
  readonly heroes$ = new BehaviorSubject<Hero[]>([]);
  private readonly loading = new Subject<boolean>();
  protected readonly saved = new ReplaySubject<number>(1);
  #errors = new Subject<Error>();
  events: Subject<string>;
  readonly view$ = this.heroes$.asObservable();
  readonly count: Observable<number>;
}`;

    expect(runRule(noExposedSubjectRule, code).map(({ line, column, message }) => ({ line, column, message }))).toEqual([
      { line: 2, column: 12, message: 'Subject "heroes$" is publicly exposed' },
      { line: 6, column: 3, message: 'Subject "events" is publicly exposed' },
    ]);
  });
});

describe('rxjs/no-nested-subscribe', () => {
  it('reports subscribe calls inside another subscribe call', () => {
    const code = `outer$.subscribe((value) => {
  inner$.subscribe((other) => {
    innermost$.subscribe();
  });
});
other$.pipe(switchMap(() => inner$)).subscribe();
outer$.subscribe({ next: () => inner$.subscribe() });`;

    const findings = runRule(noNestedSubscribeRule, code);

    expect(findings.map((finding) => [finding.line, finding.column])).toEqual([
      [2, 10],
      [3, 16],
      [7, 39],
    ]);
    expect(new Set(findings.map((finding) => finding.message))).toEqual(
      new Set(['subscribe() called inside another subscribe() callback']),
    );
  });
});

describe('rxjs/takeuntil-last', () => {
  const code = `source$.pipe(takeUntil(this.destroy$), switchMap((query) => search(query))).subscribe();
source$.pipe(map((value) => value), takeUntil(this.destroy$), shareReplay(1)).subscribe();
source$.pipe(takeUntil(this.destroy$), customOperator).subscribe();
source$.pipe(switchMap((query) => search(query)), takeUntil(this.destroy$)).subscribe();`;

  it('reports operators after takeUntil that are not allowed there', () => {
    expect(runRule(takeUntilLastRule, code)).toEqual([
      {
        line: 1,
        column: 14,
        message: 'takeUntil should be the last operator in pipe(); "switchMap" follows it',
        suggestion: 'Move takeUntil to the end of the pipe',
      },
      {
        line: 3,
        column: 14,
        message: 'takeUntil should be the last operator in pipe(); "customOperator" follows it',
        suggestion: 'Move takeUntil to the end of the pipe',
      },
    ]);
  });

  it('replaces the default allow list with the configured one', () => {
    expect(messagesOf(takeUntilLastRule, code, { allowAfter: ['switchMap'] })).toEqual([
      'takeUntil should be the last operator in pipe(); "shareReplay" follows it',
      'takeUntil should be the last operator in pipe(); "customOperator" follows it',
    ]);
  });
});
