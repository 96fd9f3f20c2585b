/**
 * Grammar Rules
 * Productions for every non-terminal. Expression operator levels are
 * listed in parser/precedence.ts; the expression entries here describe
 * what an operand can start with.
 */

import { DATA_TYPES, MODIFIERS } from '../lexer/vocabulary.js';
import { TOKEN_KINDS } from '../types.js';
import {
  kind,
  many,
  type NodeMode,
  type NonTerminal,
  nt,
  objectDelimiter,
  opt,
  type Production,
  sepBy,
  some,
  sym,
  word,
} from './symbols.js';

export type RuleTable = Record<NonTerminal, readonly Production[]>;

const IDENT = kind(TOKEN_KINDS.IDENTIFIER);
const COMMA = sym(',');
const SEMI = sym(';');
const LPAREN = sym('(');
const RPAREN = sym(')');
const LBRACE = sym('{');
const RBRACE = sym('}');
const DOT = sym('.');

/** `( Expr )` */
const condition = [LPAREN, nt('Expr'), RPAREN] as const;

/** `.name( Lambda )` */
function lambdaOperation(name: string): Production[] {
  return [[DOT, word(name), LPAREN, nt('Lambda'), RPAREN]];
}

export function defineRules(): RuleTable {
  return {
    // ----------------------------------------------------------
    // Program structure
    // ----------------------------------------------------------
    Program: [[many(nt('Class'))]],
    Class: [
      [
        opt(nt('Modifiers')),
        word('class'),
        IDENT,
        opt(nt('ClassInherit')),
        opt(nt('InterfaceInherit')),
        nt('ClassScope'),
      ],
    ],
    ClassScope: [[LBRACE, nt('ClassBody'), RBRACE]],
    Modifiers: [[some(nt('Modifier'))]],
    Modifier: [...MODIFIERS].map((m) => [word(m)]),
    ClassInherit: [[sym(':>'), IDENT]],
    InterfaceInherit: [[sym(':>>'), sepBy(COMMA, IDENT)]],
    ClassBody: [[many(nt('Member'))]],
    Member: [[nt('MainMethod')], [nt('Method')], [nt('Field')]],
    Field: [[opt(nt('Modifiers')), nt('Type'), nt('Declarator'), SEMI]],
    Method: [
      [opt(nt('Modifiers')), nt('Type'), nt('MethodName'), nt('MethodRest')],
    ],
    MethodName: [[IDENT], [word('main')]],
    MethodRest: [
      [
        LPAREN,
        opt(nt('Parameters')),
        RPAREN,
        opt(nt('TypeConstraint')),
        nt('Block'),
      ],
    ],
    MainMethod: [[word('main'), nt('MainRest')]],
    MainRest: [[LPAREN, opt(IDENT), RPAREN, nt('Block')]],
    Parameters: [[sepBy(COMMA, nt('Parameter'))]],
    Parameter: [[nt('Type'), IDENT]],
    TypeConstraint: [[word('where type'), sepBy(COMMA, IDENT)]],

    // ----------------------------------------------------------
    // Types
    // ----------------------------------------------------------
    Type: [
      [nt('DataType'), opt(nt('ObjectType')), opt(nt('ArraySuffix'))],
      [IDENT, opt(nt('ObjectType')), opt(nt('ArraySuffix'))],
    ],
    DataType: [...DATA_TYPES].map((t) => [word(t)]),
    ObjectType: [[objectDelimiter('<'), nt('TypeName'), objectDelimiter('>')]],
    TypeName: [[kind(TOKEN_KINDS.STR_LIT)], [nt('StringLiteral')]],
    ArraySuffix: [[sym('['), sym(']')]],

    // ----------------------------------------------------------
    // Statements
    // ----------------------------------------------------------
    Block: [[LBRACE, many(nt('Statement')), RBRACE]],
    Statement: [
      [nt('Block')],
      [nt('IfStatement')],
      [nt('SwitchStatement')],
      [nt('WhileLoop')],
      [nt('ForLoop')],
      [nt('DoStatement')],
      [nt('BreakStatement')],
      [nt('ExitWhenStatement')],
      [nt('ExitStatement')],
      [nt('OutputStatement')],
      [nt('PrintStatement')],
      [nt('InspectBlock')],
      [nt('QueryBlock')],
      [nt('Declaration')],
      [nt('AliasDeclaration')],
      [nt('ExpressionStatement')],
    ],
    Declaration: [[nt('Type'), sepBy(COMMA, nt('Declarator')), SEMI]],
    LocalDeclaration: [[nt('Type'), sepBy(COMMA, nt('Declarator'))]],
    Declarator: [[IDENT, opt(sym('='), nt('Expr'))]],
    AliasDeclaration: [
      [nt('Type'), IDENT, sym('='), word('ALIAS'), IDENT, SEMI],
    ],
    ExpressionStatement: [[nt('Expr'), SEMI]],
    IfStatement: [
      [word('if'), ...condition, nt('Block'), opt(nt('ElseClause'))],
    ],
    ElseClause: [[word('else'), nt('ElseBody')]],
    ElseBody: [[nt('IfStatement')], [nt('Block')]],
    SwitchStatement: [
      [
        nt('SwitchKeyword'),
        ...condition,
        LBRACE,
        many(nt('SwitchCase')),
        RBRACE,
      ],
    ],
    SwitchKeyword: [[word('switch')], [word('switch-fall')]],
    SwitchCase: [[nt('CaseClause')], [nt('DefaultClause')]],
    CaseClause: [
      [word('case'), nt('CaseLabel'), sym(':'), many(nt('Statement'))],
    ],
    DefaultClause: [[word('default'), sym(':'), many(nt('Statement'))]],
    CaseLabel: [
      [kind(TOKEN_KINDS.INT_LIT)],
      [kind(TOKEN_KINDS.FLOAT_LIT)],
      [kind(TOKEN_KINDS.BOOL_LIT)],
      [kind(TOKEN_KINDS.DATE_LIT)],
      [kind(TOKEN_KINDS.FRAC_LIT)],
      [nt('StringLiteral')],
      [IDENT],
      [nt('SignedNumber')],
    ],
    SignedNumber: [
      [sym('-'), nt('NumericLiteral')],
      [sym('+'), nt('NumericLiteral')],
    ],
    NumericLiteral: [
      [kind(TOKEN_KINDS.INT_LIT)],
      [kind(TOKEN_KINDS.FLOAT_LIT)],
    ],
    ForLoop: [
      [
        word('for'),
        LPAREN,
        opt(nt('ForInit')),
        SEMI,
        opt(nt('Expr')),
        SEMI,
        opt(nt('Expr')),
        RPAREN,
        nt('Block'),
      ],
    ],
    ForInit: [[nt('LocalDeclaration')], [nt('Expr')]],
    WhileLoop: [[word('while'), ...condition, nt('Block')]],
    DoStatement: [[nt('EnhancedForLoop')], [nt('DoWhileLoop')]],
    DoWhileLoop: [[word('do'), nt('Block'), word('while'), ...condition, SEMI]],
    EnhancedForLoop: [
      [
        word('do'),
        word('for'),
        LPAREN,
        nt('LoopVariable'),
        word('in'),
        nt('Expr'),
        RPAREN,
        nt('Block'),
      ],
    ],
    LoopVariable: [[nt('Type'), IDENT]],
    BreakStatement: [[word('break'), SEMI]],
    ExitStatement: [[word('exit'), SEMI]],
    ExitWhenStatement: [[word('exit when'), nt('Expr'), SEMI]],
    OutputStatement: [
      [
        word('Output'),
        sym('::'),
        word('print'),
        LPAREN,
        opt(nt('Expr')),
        RPAREN,
        SEMI,
      ],
    ],
    PrintStatement: [[word('print'), LPAREN, opt(nt('Expr')), RPAREN, SEMI]],
    InspectBlock: [[word('inspect'), nt('Block')]],
    QueryBlock: [
      [word('inline_query'), LBRACE, many(nt('QueryClause')), RBRACE],
    ],
    QueryClause: [
      [nt('FromClause')],
      [nt('FilterClause')],
      [nt('SelectClause')],
    ],
    FromClause: [[word('from'), IDENT, SEMI]],
    FilterClause: [[word('filter_by'), LPAREN, nt('Lambda'), RPAREN, SEMI]],
    SelectClause: [[word('select'), LPAREN, nt('Lambda'), RPAREN, SEMI]],

    // ----------------------------------------------------------
    // Expressions
    // ----------------------------------------------------------
    Expr: [[nt('Unary')]],
    Unary: [
      [kind(TOKEN_KINDS.UNARY_OP), nt('Unary')],
      // A sign after a keyword is lexed as ARITHMETIC_OP
      [sym('-'), nt('Unary')],
      [sym('+'), nt('Unary')],
      [sym('!'), nt('Unary')],
      [sym('~'), nt('Unary')],
      [nt('ObjectType'), nt('Unary')],
      [nt('Postfix')],
    ],
    Postfix: [[nt('Primary')]],
    Primary: [
      [IDENT],
      [nt('Literal')],
      [nt('StringLiteral')],
      [nt('Group')],
      [nt('ArrayLiteral')],
      [nt('InputCall')],
      [word('today')],
      [kind(TOKEN_KINDS.UNKNOWN)],
      // Shares FIRST with IDENT; chosen by lookahead for '->'
      [nt('Lambda')],
    ],
    Literal: [
      [kind(TOKEN_KINDS.INT_LIT)],
      [kind(TOKEN_KINDS.FLOAT_LIT)],
      [kind(TOKEN_KINDS.BOOL_LIT)],
      [kind(TOKEN_KINDS.DATE_LIT)],
      [kind(TOKEN_KINDS.FRAC_LIT)],
      [kind(TOKEN_KINDS.COMP_LIT)],
    ],
    StringLiteral: [
      [
        kind(TOKEN_KINDS.STR_DELIM),
        many(nt('StringPiece')),
        kind(TOKEN_KINDS.STR_DELIM),
      ],
    ],
    StringPiece: [
      [kind(TOKEN_KINDS.STR_LIT)],
      [kind(TOKEN_KINDS.CHAR_LIT)],
      [kind(TOKEN_KINDS.ESCAPE_CHAR)],
      [kind(TOKEN_KINDS.UNKNOWN)],
    ],
    Group: [[LPAREN, nt('Expr'), RPAREN]],
    ArrayLiteral: [[sym('['), opt(sepBy(COMMA, nt('Expr'))), sym(']')]],
    Arguments: [[LPAREN, opt(sepBy(COMMA, nt('Expr'))), RPAREN]],
    InputCall: [
      [
        word('Input'),
        sym('::'),
        word('get'),
        LPAREN,
        opt(nt('StringLiteral')),
        RPAREN,
      ],
    ],
    Lambda: [[nt('LambdaBlock')], [nt('LambdaExpr')]],
    LambdaExpr: [[IDENT, sym('->'), nt('Expr')]],
    LambdaBlock: [[IDENT, sym('->'), nt('Block')]],

    // ----------------------------------------------------------
    // Data operations
    // ----------------------------------------------------------
    FilterExpr: lambdaOperation('filter_by'),
    ValidateExpr: lambdaOperation('validate'),
    ModifyExpr: lambdaOperation('modify'),
    ExportExpr: [
      [
        DOT,
        word('export_as'),
        LPAREN,
        nt('StringLiteral'),
        COMMA,
        nt('StringLiteral'),
        RPAREN,
      ],
    ],
    ToMixedExpr: [[DOT, word('toMixed'), LPAREN, RPAREN]],
    DateFunction: [
      [DOT, nt('DateOperation'), opt(LPAREN, nt('Expr'), RPAREN)],
    ],
    DateOperation: [
      [word('before')],
      [word('after')],
      [word('today')],
      [word('year')],
      [word('month')],
      [word('day')],
    ],
  };
}

export const NODE_MODES: Partial<Record<NonTerminal, NodeMode>> = {
  ClassScope: 'inline',
  MethodRest: 'inline',
  MainRest: 'inline',

  Modifier: 'transparent',
  Member: 'transparent',
  MethodName: 'transparent',
  DataType: 'transparent',
  TypeName: 'transparent',
  Statement: 'transparent',
  ElseBody: 'transparent',
  SwitchKeyword: 'transparent',
  SwitchCase: 'transparent',
  CaseLabel: 'transparent',
  NumericLiteral: 'transparent',
  ForInit: 'transparent',
  DoStatement: 'transparent',
  QueryClause: 'transparent',
  Expr: 'transparent',
  Unary: 'transparent',
  Postfix: 'transparent',
  Primary: 'transparent',
  Literal: 'transparent',
  StringPiece: 'transparent',
  Lambda: 'transparent',
  DateOperation: 'transparent',
};
