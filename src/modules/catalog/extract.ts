import path from 'node:path'
import ts from 'typescript'
import { messageKey } from './po'

export type ExtractedMessage = {
  msgctxt?: string
  msgid: string
  msgidPlural?: string
  references: string[]
  comments: string[]
}

export type ExtractWarning = { reference: string; message: string }

export type ExtractResult = {
  messages: ExtractedMessage[]
  warnings: ExtractWarning[]
}

export type ExtractOptions = {
  functions?: string[]
  commentTag?: string
}

export type SourceInput = { fileName: string; text: string }

export const DEFAULT_FUNCTIONS = ['t', 'i18n.t', 'i18next.t', 'req.t', 'request.t']
export const DEFAULT_COMMENT_TAG = 'translators:'
export const SOURCE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx']

function scriptKind(fileName: string) {
  switch (path.extname(fileName)) {
    case '.tsx': return ts.ScriptKind.TSX
    case '.jsx': return ts.ScriptKind.JSX
    case '.js': return ts.ScriptKind.JS
    default: return ts.ScriptKind.TS
  }
}

function literalText(node: ts.Node | undefined): string | null {
  if (!node) return null
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) return node.text
  return null
}

function calleeName(expr: ts.Expression, sf: ts.SourceFile): string {
  return expr.getText(sf).replace(/\s+/g, '').replace(/\?\./g, '.')
}

function propertyName(name: ts.PropertyName): string | null {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) return name.text
  return null
}

function readOptions(node: ts.Node | undefined) {
  const result: { context?: string; plural: boolean; pluralDefault?: string; dynamicContext: boolean } = { plural: false, dynamicContext: false }
  if (!node || !ts.isObjectLiteralExpression(node)) return result
  for (const prop of node.properties) {
    if (ts.isShorthandPropertyAssignment(prop)) {
      if (prop.name.text === 'count') result.plural = true
      if (prop.name.text === 'context') result.dynamicContext = true
      continue
    }
    if (!ts.isPropertyAssignment(prop)) continue
    const name = propertyName(prop.name)
    if (name === 'count') result.plural = true
    if (name === 'context') {
      const ctx = literalText(prop.initializer)
      if (ctx === null) result.dynamicContext = true
      else result.context = ctx
    }
    if (name === 'defaultValue_other') {
      const other = literalText(prop.initializer)
      if (other !== null) result.pluralDefault = other
    }
  }
  return result
}

function isStatementLike(node: ts.Node) {
  const parent = node.parent
  if (!parent) return true
  return ts.isSourceFile(parent) || ts.isBlock(parent) || ts.isModuleBlock(parent) || ts.isCaseClause(parent) || ts.isDefaultClause(parent)
}

function commentFor(node: ts.Node, sf: ts.SourceFile, tag: string): string | null {
  const text = sf.getFullText()
  let current: ts.Node | undefined = node
  // walk up to the statement so a comment above `const x = t('...')` is found
  while (current && !ts.isSourceFile(current)) {
    const ranges = ts.getLeadingCommentRanges(text, current.getFullStart()) ?? []
    for (const range of ranges.reverse()) {
      const raw = text.slice(range.pos, range.end)
      const body = raw.startsWith('//') ? raw.slice(2) : raw.slice(2, -2)
      const cleaned = body.split('\n').map(l => l.replace(/^\s*\*?\s?/, '').trim()).filter(Boolean).join(' ')
      if (cleaned.toLowerCase().startsWith(tag.toLowerCase())) {
        return cleaned.slice(tag.length).trim()
      }
    }
    if (isStatementLike(current) || ts.isJsxElement(current) || ts.isJsxSelfClosingElement(current)) break
    current = current.parent
  }
  return null
}

export function extractFromSource(input: SourceInput, options: ExtractOptions = {}): ExtractResult {
  const functions = new Set(options.functions ?? DEFAULT_FUNCTIONS)
  const tag = options.commentTag ?? DEFAULT_COMMENT_TAG
  const sf = ts.createSourceFile(input.fileName, input.text, ts.ScriptTarget.Latest, true, scriptKind(input.fileName))
  const messages: ExtractedMessage[] = []
  const warnings: ExtractWarning[] = []

  const visit = (node: ts.Node) => {
    if (ts.isCallExpression(node) && functions.has(calleeName(node.expression, sf))) {
      const line = sf.getLineAndCharacterOfPosition(node.getStart(sf)).line + 1
      const reference = `${input.fileName}:${line}`
      const msgid = literalText(node.arguments[0])
      if (msgid === null) {
        warnings.push({ reference, message: 'message id is not a string literal; skipped' })
      } else if (!msgid) {
        warnings.push({ reference, message: 'empty message id; skipped' })
      } else {
        const opts = readOptions(node.arguments[1])
        if (opts.dynamicContext) warnings.push({ reference, message: `context for "${msgid}" is not a string literal; extracted without context` })
        const comment = commentFor(node, sf, tag)
        const message: ExtractedMessage = { msgid, references: [reference], comments: comment ? [comment] : [] }
        if (opts.context !== undefined) message.msgctxt = opts.context
        if (opts.plural) message.msgidPlural = opts.pluralDefault ?? msgid
        messages.push(message)
      }
    }
    ts.forEachChild(node, visit)
  }
  visit(sf)

  return { messages, warnings }
}

export function extractMessages(inputs: SourceInput[], options: ExtractOptions = {}): ExtractResult {
  const byKey = new Map<string, ExtractedMessage>()
  const warnings: ExtractWarning[] = []

  for (const input of inputs) {
    const result = extractFromSource(input, options)
    warnings.push(...result.warnings)
    for (const msg of result.messages) {
      const key = messageKey(msg)
      const existing = byKey.get(key)
      if (!existing) {
        byKey.set(key, { ...msg, references: [...msg.references], comments: [...msg.comments] })
        continue
      }
      for (const ref of msg.references) if (!existing.references.includes(ref)) existing.references.push(ref)
      for (const c of msg.comments) if (!existing.comments.includes(c)) existing.comments.push(c)
      if (existing.msgidPlural === undefined && msg.msgidPlural !== undefined) existing.msgidPlural = msg.msgidPlural
    }
  }

  return { messages: Array.from(byKey.values()), warnings }
}
