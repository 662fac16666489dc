import {createHash} from 'node:crypto'
import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {formatCommand, formatDuration, hashChunkSize, sha1, sha1File, splitFileName} from '../utils.js'
import {createTmpDir} from '../../__tests__/helpers.js'

// -- splitFileName -----------------------------------------------------------

test('scan.nii.gz splits into scan and .nii.gz', t => {
  t.deepEqual(splitFileName('scan.nii.gz'), {stem: 'scan', ext: '.nii.gz'})
})

test('other double suffixes split on the last one', t => {
  t.deepEqual(splitFileName('archive.tar.gz'), {stem: 'archive.tar', ext: '.gz'})
})

test('single suffix', t => {
  t.deepEqual(splitFileName('report.pdf'), {stem: 'report', ext: '.pdf'})
})

test('no suffix and dot-files have an empty extension', t => {
  t.deepEqual(splitFileName('README'), {stem: 'README', ext: ''})
  t.deepEqual(splitFileName('.bashrc'), {stem: '.bashrc', ext: ''})
})

test('directories are stripped', t => {
  t.deepEqual(splitFileName('/tmp/job-1/output/t1.nii.gz'), {stem: 't1', ext: '.nii.gz'})
})

test('a plain .gz is not taken for .nii.gz', t => {
  t.deepEqual(splitFileName('nii.gz'), {stem: 'nii', ext: '.gz'})
})

// -- hashing -----------------------------------------------------------------

test('sha1 of a string', t => {
  t.is(sha1('abc'), 'a9993e364706816aba3e25717850c26c9cd0d89d')
})

test('sha1File of an empty file is the SHA-1 of nothing', async t => {
  const dir = await createTmpDir()
  const path = join(dir, 'empty')
  await writeFile(path, '')
  t.is(await sha1File(path), 'da39a3ee5e6b4b0d3255bfef95601890afd80709')
})

for (const size of [0, 1, hashChunkSize - 1, hashChunkSize, hashChunkSize + 1]) {
  test(`chunked digest equals one-pass digest for ${size} bytes`, async t => {
    const dir = await createTmpDir()
    const path = join(dir, 'data.bin')
    const content = Buffer.alloc(size)
    for (let i = 0; i < size; i++) {
      content[i] = (i * 31) % 251
    }

    await writeFile(path, content)
    const expected = createHash('sha1').update(content).digest('hex')
    t.is(await sha1File(path), expected)
  })
}

test('digest does not depend on the chunk size', async t => {
  const dir = await createTmpDir()
  const path = join(dir, 'data.txt')
  await writeFile(path, 'The quick brown fox jumps over the lazy dog')
  t.is(await sha1File(path, 7), '2fd4e1c67a2d28fced849ee1bb76e7391b93eb12')
  t.is(await sha1File(path), '2fd4e1c67a2d28fced849ee1bb76e7391b93eb12')
})

// -- formatting --------------------------------------------------------------

test('formatCommand joins with spaces', t => {
  t.is(formatCommand(['t1.nii.gz', 't2.nii.gz']), 't1.nii.gz t2.nii.gz')
})

test('formatDuration', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})
