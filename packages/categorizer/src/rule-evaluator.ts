/**
 * Script-driven categorization.
 *
 * A rules script is plain JavaScript that registers ordered rules:
 *
 *   rule(/KFC/i, { account: 'Expenses:Food:Restaurant', tags: ['food'] });
 *   rule((t) => t.amount > 0 && t.payee === 'ACME', (t) => ({ account: 'Income:Salary', alias: `Salary ${t.date}` }));
 *
 * Each transaction is evaluated in a fresh vm context, so nothing survives
 * between transactions. The context's global is a null-prototype object and
 * string code generation is disabled, so scripts reach neither host-realm
 * constructors nor eval. Everything the script runs, including reading back a
 * value it threw, happens under the wall-clock budget. The first rule whose
 * predicate matches decides the directive.
 */

import { readFileSync } from 'fs';
import vm from 'vm';
import {
  CategorizationDirectiveSchema,
  CategorizationError,
  DEFAULT_SCRIPT_TIMEOUT_MS,
  ScriptLoadError,
  type CategorizationDirective,
  type Transaction,
} from '@ledgersync/types';
import { toScriptView, type EvaluationContext } from './script-view.js';

export interface RuleEvaluator {
  /** Zero or one directive; throws CategorizationError when the script fails for this transaction. */
  evaluate(txn: Transaction, context?: EvaluationContext): CategorizationDirective[];
}

export interface ScriptOptions {
  /** Wall-clock budget per transaction. */
  timeoutMs?: number;
  filename?: string;
}

// The transaction arrives as JSON and is rebuilt inside the sandbox.
const PRELUDE = `
var transaction = Object.freeze(JSON.parse(__transaction));
var __rules = [];
function rule(when, then) {
  if (typeof when !== 'function' && typeof when !== 'string' && !(when instanceof RegExp)) {
    throw new TypeError('rule() expects a predicate function, a RegExp or a string');
  }
  __rules.push([when, then]);
}
`;

const MATCHER = `
(function () {
  function matches(when, t) {
    if (typeof when === 'function') return Boolean(when(t));
    if (when instanceof RegExp) return when.test(t.narration);
    return t.narration.toLowerCase().indexOf(String(when).toLowerCase()) !== -1;
  }
  for (var i = 0; i < __rules.length; i++) {
    var entry = __rules[i];
    if (matches(entry[0], transaction)) {
      var directive = typeof entry[1] === 'function' ? entry[1](transaction) : entry[1];
      return directive === undefined || directive === null ? null : JSON.stringify(directive);
    }
  }
  return null;
})()
`;

const CONTEXT_OPTIONS: vm.CreateContextOptions = {
  codeGeneration: { strings: false, wasm: false },
  microtaskMode: 'afterEvaluate',
};

const DESCRIBE_ERROR = `
(function (e) {
  try {
    return e !== null && typeof e === 'object' && typeof e.message === 'string' ? e.message : String(e);
  } catch (_) {
    return 'unprintable error';
  }
})(__error)
`;

const UNPRINTABLE = 'unprintable error';

type SandboxGlobals = {
  __transaction: string;
  __error?: unknown;
};

function createSandbox(transactionJson: string): SandboxGlobals {
  // Without a prototype, `this.constructor` inside the script resolves to the
  // context's own Function, which cannot compile strings.
  const globals: SandboxGlobals = Object.create(null);
  globals.__transaction = transactionJson;
  vm.createContext(globals, CONTEXT_OPTIONS);
  return globals;
}

/** Message of an error raised by the host (compile errors, timeouts, fs). */
function describeHostError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Message of a value that may have been thrown by the script. It is read inside
 * the sandbox under a timeout, since getters, proxies and toString are script code.
 */
function describeSandboxError(error: unknown, sandbox: SandboxGlobals, describer: vm.Script, timeoutMs: number): string {
  try {
    sandbox.__error = error;
    const described: unknown = describer.runInContext(sandbox, { timeout: timeoutMs });
    return typeof described === 'string' ? described : UNPRINTABLE;
  } catch {
    return UNPRINTABLE;
  }
}

/**
 * Evaluator with no script loaded: every transaction stays uncategorized.
 */
export class NullRuleEvaluator implements RuleEvaluator {
  evaluate(): CategorizationDirective[] {
    return [];
  }
}

export class ScriptRuleEvaluator implements RuleEvaluator {
  private readonly prelude: vm.Script;
  private readonly script: vm.Script;
  private readonly matcher: vm.Script;
  private readonly describer: vm.Script;
  private readonly timeoutMs: number;
  readonly filename: string;

  constructor(source: string, options: ScriptOptions = {}) {
    this.filename = options.filename ?? 'rules.js';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SCRIPT_TIMEOUT_MS;

    try {
      this.script = new vm.Script(source, { filename: this.filename });
    } catch (error) {
      throw new ScriptLoadError(
        this.filename,
        `Failed to compile rules script ${this.filename}: ${describeHostError(error)}`,
        { cause: error }
      );
    }
    this.prelude = new vm.Script(PRELUDE, { filename: 'ledgersync:prelude' });
    this.matcher = new vm.Script(MATCHER, { filename: 'ledgersync:matcher' });
    this.describer = new vm.Script(DESCRIBE_ERROR, { filename: 'ledgersync:describe' });

    // Registering the rules once up front surfaces top-level script errors before any sync work.
    const sandbox = createSandbox('null');
    try {
      this.prelude.runInContext(sandbox, { timeout: this.timeoutMs });
      this.script.runInContext(sandbox, { timeout: this.timeoutMs });
    } catch (error) {
      const reason = describeSandboxError(error, sandbox, this.describer, this.timeoutMs);
      throw new ScriptLoadError(this.filename, `Failed to load rules script ${this.filename}: ${reason}`);
    }
  }

  evaluate(txn: Transaction, context: EvaluationContext = {}): CategorizationDirective[] {
    const startedAt = Date.now();
    const remaining = (): number => Math.max(1, this.timeoutMs - (Date.now() - startedAt));

    let output: unknown;
    const sandbox = createSandbox(JSON.stringify(toScriptView(txn, context)));
    try {
      this.prelude.runInContext(sandbox, { timeout: remaining() });
      this.script.runInContext(sandbox, { timeout: remaining() });
      output = this.matcher.runInContext(sandbox, { timeout: remaining() });
    } catch (error) {
      const reason = describeSandboxError(error, sandbox, this.describer, this.timeoutMs);
      throw new CategorizationError(txn.id, `Rules script failed for transaction ${txn.id}: ${reason}`);
    }

    if (typeof output !== 'string') {
      return [];
    }

    const parsed = CategorizationDirectiveSchema.safeParse(JSON.parse(output));
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'directive'}: ${issue.message}`);
      throw new CategorizationError(txn.id, `Invalid directive for transaction ${txn.id}: ${issues.join('; ')}`);
    }

    return [parsed.data];
  }
}

export function createRuleEvaluator(source: string, options?: ScriptOptions): ScriptRuleEvaluator {
  return new ScriptRuleEvaluator(source, options);
}

/**
 * Load a rules script from disk. Without a path, no rules apply.
 */
export function loadRuleEvaluator(filePath: string | undefined, options: Omit<ScriptOptions, 'filename'> = {}): RuleEvaluator {
  if (filePath === undefined || filePath === '') {
    return new NullRuleEvaluator();
  }

  let source: string;
  try {
    source = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ScriptLoadError(filePath, `Cannot read rules script ${filePath}: ${describeHostError(error)}`, {
      cause: error,
    });
  }

  return new ScriptRuleEvaluator(source, { ...options, filename: filePath });
}
