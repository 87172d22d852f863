import { readFile, stat, writeFile, mkdir, copyFile, rm } from 'node:fs/promises'
import { dirname } from 'node:path'

interface FSX {
  readonly exists: (path: string) => Promise<boolean>
  readonly isDirectory: (path: string) => Promise<boolean>
  /** null when the file is absent; malformed JSON throws */
  readonly readJson: (path: string) => Promise<unknown>
  /** null when the file is absent */
  readonly readText: (path: string) => Promise<string | null>
  readonly writeText: (path: string, content: string) => Promise<void>
  readonly copy: (from: string, to: string) => Promise<void>
  readonly remove: (path: string) => Promise<boolean>
}

async function exists(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isFile() || s.isDirectory() } catch { return false }
}

async function isDirectory(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isDirectory() } catch { return false }
}

async function readJson(path: string): Promise<unknown> {
  let buf: string
  try { buf = await readFile(path, 'utf8') } catch { return null }
  const parsed: unknown = JSON.parse(buf)
  return parsed
}

async function readText(path: string): Promise<string | null> {
  try { return await readFile(path, 'utf8') } catch { return null }
}

async function writeText(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, content, 'utf8')
}

/** Overwrites the destination; parent directories are created as needed. */
async function copy(from: string, to: string): Promise<void> {
  await mkdir(dirname(to), { recursive: true })
  await copyFile(from, to)
}

/** Returns whether anything was there to delete. */
async function remove(path: string): Promise<boolean> {
  const present: boolean = await exists(path)
  if (present) await rm(path, { recursive: true, force: true })
  return present
}

export const fsx: FSX = { exists, isDirectory, readJson, readText, writeText, copy, remove }
