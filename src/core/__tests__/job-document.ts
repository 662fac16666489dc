import test from 'ava'
import {describeJob, parseJob, splitAppRef} from '../job-document.js'
import {JobFormatError} from '../../errors.js'

function document(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    _id: 17,
    group: 'lab',
    project: {_id: 'p1', name: 'study'},
    app: {_id: 'acme/convert:1.0'},
    inputs: [{url: 'acquisitions/a1/file', payload: {name: 't1.nii.gz'}}],
    outputs: [{url: 'acquisitions/a1/files', payload: {fext: '.nii.gz', kinds: ['anatomy'], state: ['derived'], type: 'nifti'}}],
    ...overrides
  }
}

// -- splitAppRef -------------------------------------------------------------

test('splitAppRef splits name and tag', t => {
  t.deepEqual(splitAppRef('acme/convert:1.0'), {id: 'acme/convert:1.0', name: 'acme/convert', tag: '1.0'})
})

test('splitAppRef defaults the tag to latest', t => {
  t.deepEqual(splitAppRef('convert'), {id: 'convert', name: 'convert', tag: 'latest'})
})

test('splitAppRef does not take a registry port for a tag', t => {
  t.deepEqual(splitAppRef('registry.local:5000/convert'), {id: 'registry.local:5000/convert', name: 'registry.local:5000/convert', tag: 'latest'})
  t.deepEqual(splitAppRef('registry.local:5000/convert:2'), {id: 'registry.local:5000/convert:2', name: 'registry.local:5000/convert', tag: '2'})
})

// -- parseJob ----------------------------------------------------------------

test('parseJob normalizes a complete document', t => {
  const raw = document()
  const job = parseJob(raw)
  t.is(job.id, '17')
  t.is(job.group, 'lab')
  t.deepEqual(job.project, {id: 'p1', name: 'study'})
  t.deepEqual(job.app, {id: 'acme/convert:1.0', name: 'acme/convert', tag: '1.0'})
  t.deepEqual(job.inputs, [{url: 'acquisitions/a1/file', payload: {name: 't1.nii.gz'}}])
  t.deepEqual(job.outputs, [{url: 'acquisitions/a1/files', payload: {fext: '.nii.gz', kinds: ['anatomy'], state: ['derived'], type: 'nifti'}}])
  t.is(job.document, raw)
})

test('parseJob accepts string identifiers', t => {
  t.is(parseJob(document({_id: '5f1e'})).id, '5f1e')
})

test('parseJob keeps inputs in declaration order', t => {
  const job = parseJob(document({inputs: [{url: 'b', payload: 1}, {url: 'a', payload: 2}, {url: 'c', payload: 3}]}))
  t.deepEqual(job.inputs.map(input => input.url), ['b', 'a', 'c'])
})

test('parseJob defaults missing group and project', t => {
  const job = parseJob(document({group: undefined, project: undefined}))
  t.is(job.group, '')
  t.deepEqual(job.project, {id: undefined, name: ''})
})

test('parseJob keeps output labels as sent', t => {
  const job = parseJob(document({outputs: [{url: 'out', payload: {fext: '.nii.gz', kinds: 'anatomy', state: 3, type: {name: 'nifti'}}}]}))
  t.deepEqual(job.outputs[0]?.payload, {fext: '.nii.gz', kinds: 'anatomy', state: 3, type: {name: 'nifti'}})
})

test('parseJob keeps mixed kinds lists whole', t => {
  const job = parseJob(document({outputs: [{url: 'out', payload: {fext: '.txt', kinds: ['a', 3, 'b']}}]}))
  t.deepEqual(job.outputs[0]?.payload.kinds, ['a', 3, 'b'])
})

test('parseJob turns missing labels into null', t => {
  const job = parseJob(document({outputs: [{url: 'out', payload: {fext: '.txt'}}]}))
  t.deepEqual(job.outputs[0]?.payload, {fext: '.txt', kinds: null, state: null, type: null})
})

test('parseJob rejects non-objects', t => {
  t.throws(() => parseJob(''), {instanceOf: JobFormatError})
  t.throws(() => parseJob(null), {instanceOf: JobFormatError})
  t.throws(() => parseJob([document()]), {instanceOf: JobFormatError})
})

test('parseJob rejects a document without _id', t => {
  t.throws(() => parseJob(document({_id: undefined})), {instanceOf: JobFormatError, message: 'Job document has no _id'})
})

test('parseJob rejects a document without app._id', t => {
  t.throws(() => parseJob(document({app: {}})), {instanceOf: JobFormatError, message: 'Job 17: app._id is required'})
})

test('parseJob rejects non-array inputs or outputs', t => {
  t.throws(() => parseJob(document({inputs: {}})), {message: 'Job 17: inputs must be an array'})
  t.throws(() => parseJob(document({outputs: null})), {message: 'Job 17: outputs must be an array'})
})

test('parseJob rejects an input without url', t => {
  t.throws(() => parseJob(document({inputs: [{payload: {}}]})), {message: 'Job 17: inputs[0].url is required'})
})

test('parseJob rejects an output without fext', t => {
  t.throws(() => parseJob(document({outputs: [{url: 'out', payload: {}}]})), {message: 'Job 17: outputs[0].payload.fext is required'})
})

// -- describeJob -------------------------------------------------------------

test('describeJob', t => {
  t.is(describeJob(parseJob(document())), '17 - acme/convert:1.0 - lab/study')
})
