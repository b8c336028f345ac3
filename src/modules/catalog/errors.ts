export class CatalogSyntaxError extends Error {
  file: string
  line: number

  constructor(file: string, line: number, message: string) {
    super(`${file}:${line}: ${message}`)
    this.name = 'CatalogSyntaxError'
    this.file = file
    this.line = line
  }
}

export class BundleFormatError extends Error {
  file: string

  constructor(file: string, message: string) {
    super(`${file}: ${message}`)
    this.name = 'BundleFormatError'
    this.file = file
  }
}

export class PluralFormsError extends Error {
  file: string
  line: number | null
  msgid: string | null

  // msgid is null when the catalog header itself is at fault
  constructor(file: string, line: number | null, msgid: string | null, message: string) {
    const where = line === null ? file : `${file}:${line}`
    super(msgid === null ? `${where}: ${message}` : `${where}: "${msgid}" ${message}`)
    this.name = 'PluralFormsError'
    this.file = file
    this.line = line
    this.msgid = msgid
  }
}
