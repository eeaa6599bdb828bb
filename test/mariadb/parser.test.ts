import { describe, expect, it } from 'vitest'
import {
  DEFAULT_PROMPT,
  cleanReply,
  cleanTerminalOutput,
  compilePrompt,
  detectCredentialRejection,
  isClientError,
  isStatementComplete
} from '../../src/mariadb/parser.js'

describe('DEFAULT_PROMPT', () => {
  it('matches the idle prompt whatever the current database', () => {
    expect(DEFAULT_PROMPT.test('MariaDB [(none)]> ')).toBe(true)
    expect(DEFAULT_PROMPT.test('MariaDB [shop]>\t')).toBe(true)
  })

  it('needs the trailing blank', () => {
    expect(DEFAULT_PROMPT.test('MariaDB [shop]>')).toBe(false)
  })

  it('does not match the continuation prompt', () => {
    expect(DEFAULT_PROMPT.test('    -> ')).toBe(false)
  })
})

describe('compilePrompt', () => {
  it('compiles configured text', () => {
    const prompt = compilePrompt('db\\[\\w+\\]> ')
    expect(prompt.test('db[main]> ')).toBe(true)
  })

  it('drops global and sticky flags', () => {
    const prompt = compilePrompt(/MariaDB> /giy)
    expect(prompt.flags).toBe('i')
    expect(prompt.exec('x mariadb> ')?.index).toBe(2)
    expect(prompt.exec('x mariadb> ')?.index).toBe(2)
  })
})

describe('cleanTerminalOutput', () => {
  it('removes escape sequences and carriage returns', () => {
    expect(cleanTerminalOutput('\x1b[1mbold\x1b[0m\r\nline\r\n')).toBe('bold\nline\n')
  })

  it('removes window title sequences and null bytes', () => {
    expect(cleanTerminalOutput('\x1b]0;mariadb\x07ok\0')).toBe('ok')
  })
})

describe('cleanReply', () => {
  it('drops the echoed command line', () => {
    expect(cleanReply('source /tmp/stmt\r\n1\r\n', 'source /tmp/stmt')).toBe('1')
  })

  it('drops an echo the terminal wrapped over several lines', () => {
    expect(cleanReply('source /srv/notebooks/de\r\nep/.mariadb_statement-x\r\n1\r\n', 'source /srv/notebooks/deep/.mariadb_statement-x')).toBe('1')
    expect(cleanReply('source /srv/notebooks/de \rep/stmt\r\nERROR 1146 (42S02): Table missing\r\n', 'source /srv/notebooks/deep/stmt')).toBe(
      'ERROR 1146 (42S02): Table missing'
    )
  })

  it('keeps a reply that only starts like the echo', () => {
    expect(cleanReply('source of truth\r\n', 'source /tmp/stmt')).toBe('source of truth')
  })

  it('keeps the first line when it is not the echo', () => {
    expect(cleanReply('<TABLE BORDER=1>\r\n</TABLE>\r\n', 'source /tmp/stmt')).toBe('<TABLE BORDER=1>\n</TABLE>')
  })

  it('returns empty text when only the echo came back', () => {
    expect(cleanReply('source /tmp/stmt\r\n', 'source /tmp/stmt')).toBe('')
    expect(cleanReply('source /tmp/stmt', 'source /tmp/stmt')).toBe('')
  })

  it('trims blank lines around the reply', () => {
    expect(cleanReply('\r\n\r\nERROR 1146 (42S02): Table missing\r\n\r\n', 'source /x')).toBe(
      'ERROR 1146 (42S02): Table missing'
    )
  })
})

describe('isClientError', () => {
  it('recognises replies starting with the error marker', () => {
    expect(isClientError('ERROR 1064 (42000) at line 1: syntax error')).toBe(true)
  })

  it('ignores the marker elsewhere in the reply', () => {
    expect(isClientError('<TD>ERROR</TD>')).toBe(false)
    expect(isClientError('')).toBe(false)
  })
})

describe('detectCredentialRejection', () => {
  it('finds the access denied message', () => {
    expect(
      detectCredentialRejection("ERROR 1045 (28000): Access denied for user 'test'@'localhost' (using password: YES)\r\n")
    ).toBe(true)
  })

  it('does not flag other startup failures', () => {
    expect(detectCredentialRejection("ERROR 2002 (HY000): Can't connect to local server")).toBe(false)
  })
})

describe('isStatementComplete', () => {
  it('ends on a semicolon or \\G', () => {
    expect(isStatementComplete('SELECT 1;  ')).toBe(true)
    expect(isStatementComplete('SELECT * FROM t\\G')).toBe(true)
  })

  it('continues otherwise', () => {
    expect(isStatementComplete('SELECT *')).toBe(false)
    expect(isStatementComplete('')).toBe(false)
  })
})
