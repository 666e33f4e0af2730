/**
 * Expression sandbox for transformer scripts.
 *
 * Scripts are mathjs expressions evaluated against a scope that holds only
 * `data` and `state`. The instance is shared by every pipeline, so functions
 * that would let a script reconfigure it or evaluate further code are
 * replaced; the host keeps its own compile function, captured before the
 * replacement.
 */

import { all, create, type EvalFunction } from 'mathjs';

const math = create(all, { matrix: 'Array' });

const compileExpression = math.compile;

function disabled(name: string): () => never {
  return () => {
    throw new Error(`Function ${name} is disabled`);
  };
}

math.import(
  {
    import: disabled('import'),
    config: disabled('config'),
    createUnit: disabled('createUnit'),
    evaluate: disabled('evaluate'),
    parse: disabled('parse'),
    compile: disabled('compile'),
    simplify: disabled('simplify'),
    derivative: disabled('derivative'),
    resolve: disabled('resolve'),
  },
  { override: true }
);

export type CompiledScript = EvalFunction;

/**
 * Compile a script once; the result is evaluated per request
 * @throws SyntaxError when the script does not parse
 */
export function compileScript(source: string): CompiledScript {
  return compileExpression(source);
}
