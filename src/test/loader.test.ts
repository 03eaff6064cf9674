import { assert } from 'chai'

import { decodeDataUri, getDataUriMediaType, isSvgReference, loadBytes } from '../loader.js'

import { fixturePath } from './util.js'

const decode = (bytes: Uint8Array | undefined): string | undefined => bytes && Buffer.from(bytes).toString('utf-8')

describe('loader', () => {
	describe('decodeDataUri()', () => {
		it('decodes base64 payloads', () => {
			assert.strictEqual(decode(decodeDataUri('data:text/plain;base64,aGk=')), 'hi')
		})
		it('decodes percent-encoded payloads', () => {
			assert.strictEqual(decode(decodeDataUri('data:,a%20b')), 'a b')
		})
		it('returns undefined for malformed percent escapes', () => {
			assert.isUndefined(decodeDataUri('data:,%E0%A4%A'))
		})
	})

	describe('getDataUriMediaType()', () => {
		it('drops parameters', () => {
			assert.strictEqual(getDataUriMediaType('data:image/svg+xml;charset=utf-8,<svg/>'), 'image/svg+xml')
		})
	})

	describe('isSvgReference()', () => {
		it('recognizes SVG data URIs', () => {
			assert.isTrue(isSvgReference('data:image/svg+xml;base64,PHN2Zy8+'))
			assert.isFalse(isSvgReference('data:image/png;base64,AAAA'))
		})
		it('recognizes the extension of paths', () => {
			assert.isTrue(isSvgReference('images/logo.SVG?version=2'))
			assert.isFalse(isSvgReference('images/logo.png'))
		})
	})

	describe('loadBytes()', () => {
		it('reads files', () => {
			assert.include(decode(loadBytes(fixturePath('square.svg'))) ?? '', '<svg')
		})
		it('returns undefined for missing files', () => {
			assert.isUndefined(loadBytes(fixturePath('missing.svg')))
		})
	})
})
