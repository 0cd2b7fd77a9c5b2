// src/agents/tools/calculator.ts
// 计算器工具 - 安全的算术表达式求值（不使用 eval）

import { defineTool, stringArg, type Tool } from './types.js';

type Token =
  | { kind: 'number'; value: number }
  | { kind: 'ident'; name: string }
  | { kind: 'op'; op: string };

const OPERATORS = ['**', '//', '+', '-', '*', '/', '%', '(', ')', ','];

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const numberMatch = /^(\d+\.?\d*|\.\d+)(e[+-]?\d+)?/i.exec(input.slice(i));
    if (numberMatch) {
      tokens.push({ kind: 'number', value: Number(numberMatch[0]) });
      i += numberMatch[0].length;
      continue;
    }

    const identMatch = /^[A-Za-z_]\w*/.exec(input.slice(i));
    if (identMatch) {
      tokens.push({ kind: 'ident', name: identMatch[0] });
      i += identMatch[0].length;
      continue;
    }

    const op = OPERATORS.find(o => input.startsWith(o, i));
    if (op) {
      tokens.push({ kind: 'op', op });
      i += op.length;
      continue;
    }

    throw new Error(`无法识别的字符 '${ch}'`);
  }

  return tokens;
}

const CONSTANTS: Record<string, number> = {
  pi: Math.PI,
  e: Math.E,
};

function requireArity(name: string, args: number[], min: number, max = min): void {
  if (args.length < min || args.length > max) {
    throw new Error(`${name}() 参数个数错误`);
  }
}

function domainCheck(value: number): number {
  if (Number.isNaN(value)) {
    throw new Error('math domain error');
  }
  return value;
}

const FUNCTIONS: Record<string, (args: number[]) => number> = {
  abs: (a) => { requireArity('abs', a, 1); return Math.abs(a[0]); },
  round: (a) => {
    requireArity('round', a, 1, 2);
    const digits = a[1] ?? 0;
    const factor = Math.pow(10, digits);
    return Math.round(a[0] * factor) / factor;
  },
  min: (a) => { requireArity('min', a, 1, Infinity); return Math.min(...a); },
  max: (a) => { requireArity('max', a, 1, Infinity); return Math.max(...a); },
  sum: (a) => a.reduce((acc, v) => acc + v, 0),
  pow: (a) => { requireArity('pow', a, 2); return Math.pow(a[0], a[1]); },
  sqrt: (a) => { requireArity('sqrt', a, 1); return domainCheck(Math.sqrt(a[0])); },
  sin: (a) => { requireArity('sin', a, 1); return Math.sin(a[0]); },
  cos: (a) => { requireArity('cos', a, 1); return Math.cos(a[0]); },
  tan: (a) => { requireArity('tan', a, 1); return Math.tan(a[0]); },
  log: (a) => {
    requireArity('log', a, 1, 2);
    if (a[0] <= 0) throw new Error('math domain error');
    return a.length === 2 ? Math.log(a[0]) / Math.log(a[1]) : Math.log(a[0]);
  },
  log10: (a) => {
    requireArity('log10', a, 1);
    if (a[0] <= 0) throw new Error('math domain error');
    return Math.log10(a[0]);
  },
  exp: (a) => { requireArity('exp', a, 1); return Math.exp(a[0]); },
};

/**
 * 递归下降求值，** 右结合且优先级高于一元负号：
 * expr := term (('+' | '-') term)*
 * term := unary (('*' | '/' | '//' | '%') unary)*
 * unary := ('+' | '-') unary | power
 * power := primary ('**' unary)?
 */
class ExpressionParser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) {
      throw new Error('表达式为空');
    }
    const value = this.expr();
    if (this.pos < this.tokens.length) {
      throw new Error('表达式语法错误');
    }
    return value;
  }

  private peekOp(...ops: string[]): string | null {
    const token = this.tokens[this.pos];
    if (token && token.kind === 'op' && ops.includes(token.op)) {
      return token.op;
    }
    return null;
  }

  private expectOp(op: string): void {
    if (!this.peekOp(op)) {
      throw new Error(`缺少 '${op}'`);
    }
    this.pos++;
  }

  private expr(): number {
    let value = this.term();
    let op: string | null;
    while ((op = this.peekOp('+', '-'))) {
      this.pos++;
      const rhs = this.term();
      value = op === '+' ? value + rhs : value - rhs;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    let op: string | null;
    while ((op = this.peekOp('*', '/', '//', '%'))) {
      this.pos++;
      const rhs = this.unary();
      if (op === '*') {
        value = value * rhs;
        continue;
      }
      if (rhs === 0) {
        throw new Error(op === '%' ? 'modulo by zero' : 'division by zero');
      }
      if (op === '/') {
        value = value / rhs;
      } else if (op === '//') {
        value = Math.floor(value / rhs);
      } else {
        // 向下取整取模：结果符号与除数一致
        value = value - rhs * Math.floor(value / rhs);
      }
    }
    return value;
  }

  private unary(): number {
    const op = this.peekOp('+', '-');
    if (op) {
      this.pos++;
      const value = this.unary();
      return op === '-' ? -value : value;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.peekOp('**')) {
      this.pos++;
      const exponent = this.unary();
      return domainCheck(Math.pow(base, exponent));
    }
    return base;
  }

  private primary(): number {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new Error('表达式不完整');
    }

    if (token.kind === 'number') {
      this.pos++;
      return token.value;
    }

    if (token.kind === 'ident') {
      this.pos++;
      if (this.peekOp('(')) {
        const fn = Object.hasOwn(FUNCTIONS, token.name) ? FUNCTIONS[token.name] : undefined;
        if (!fn) {
          throw new Error(`未知函数 '${token.name}'`);
        }
        return fn(this.callArguments());
      }
      const constant = Object.hasOwn(CONSTANTS, token.name) ? CONSTANTS[token.name] : undefined;
      if (constant === undefined) {
        throw new Error(`未知名称 '${token.name}'`);
      }
      return constant;
    }

    if (token.op === '(') {
      this.pos++;
      const value = this.expr();
      this.expectOp(')');
      return value;
    }

    throw new Error(`意外的符号 '${token.op}'`);
  }

  private callArguments(): number[] {
    this.expectOp('(');
    const args: number[] = [];
    if (this.peekOp(')')) {
      this.pos++;
      return args;
    }
    args.push(this.expr());
    while (this.peekOp(',')) {
      this.pos++;
      args.push(this.expr());
    }
    this.expectOp(')');
    return args;
  }
}

export function evaluateExpression(expression: string): number {
  return new ExpressionParser(tokenize(expression)).parse();
}

export const calculatorTool: Tool = defineTool(
  {
    name: 'calculator',
    description: '执行数学计算。支持基本运算（加减乘除）和高级运算（幂、开方、三角函数等）。',
    parameters: [
      {
        name: 'expression',
        type: 'string',
        description: "数学表达式，如 '2 + 3 * 4' 或 'sqrt(16)'",
        required: true,
      },
    ],
  },
  (args) => {
    const expression = stringArg(args, 'expression', '') ?? '';
    try {
      const result = evaluateExpression(expression);
      return `计算结果: ${expression} = ${result}`;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return `计算错误: ${message}`;
    }
  }
);
