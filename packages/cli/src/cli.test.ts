import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest'
import { HELP, parseArgs, run, UsageError } from './cli'

describe('CLI', () => {
	let log: MockInstance
	let error: MockInstance

	beforeEach(() => {
		log = vi.spyOn(console, 'log').mockImplementation(() => {})
		error = vi.spyOn(console, 'error').mockImplementation(() => {})
	})

	afterEach(() => {
		vi.restoreAllMocks()
	})

	describe('parseArgs', () => {
		it('should keep edits in argument order', () => {
			const { steps, options } = parseArgs(['--fill', '1', '-s', '4', '--set', '1,2,3', '--color', '0,0,#45a2f8'])

			expect(options.size).toBe(4)
			expect(options.format).toBe('ascii')
			expect(steps).toEqual([
				{ kind: 'fill', index: 1 },
				{ kind: 'set', x: 1, y: 2, index: 3 },
				{ kind: 'color', x: 0, y: 0, color: 0x45a2f8 },
			])
		})

		it('should reject bad input', () => {
			expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus')
			expect(() => parseArgs(['--size'])).toThrow('Missing value for --size')
			expect(() => parseArgs(['--size', 'ten'])).toThrow(UsageError)
			expect(() => parseArgs(['--set', '1,2'])).toThrow('Expected x,y,index for --set, got "1,2"')
			expect(() => parseArgs(['--format', 'png'])).toThrow(UsageError)
		})
	})

	describe('run', () => {
		it('should print an ASCII grid by default', () => {
			expect(run(['--size', '3', '--set', '1,0,1', '--set', '2,2,3'])).toBe(0)
			expect(log).toHaveBeenCalledWith('0 1 0\n0 0 0\n0 0 3')
		})

		it('should apply fill before later edits', () => {
			expect(run(['-s', '4', '--fill', '1', '--color', '0,0,#8c1c84', '--format', 'hex'])).toBe(0)
			expect(log).toHaveBeenCalledWith('56555555')
		})

		it('should load raw bytes', () => {
			expect(run(['-s', '2', '--load', 'e4', '--format', 'info'])).toBe(0)
			expect(log).toHaveBeenCalledWith(
				'2x2 pixel frame, 4 pixels in 1 bytes (White: 1, Black: 1, Purple: 1, Blue: 1)'
			)
		})

		it('should render SVG with options', () => {
			expect(run(['-s', '1', '--format', 'svg', '--scale', '1'])).toBe(0)
			expect(log).toHaveBeenCalledWith(
				'<svg xmlns="http://www.w3.org/2000/svg" width="1" height="1" viewBox="0 0 1 1" shape-rendering="crispEdges">' +
					'<rect x="0" y="0" width="1" height="1" fill="#ffffff"/></svg>'
			)
		})

		it('should log edits when verbose', () => {
			expect(run(['-s', '2', '-v', '--fill', '3', '--set', '1,1,0'])).toBe(0)
			expect(error).toHaveBeenCalledWith('reset -> 3')
			expect(error).toHaveBeenCalledWith('set (1, 1) -> 0')
		})

		it('should report frame errors with exit code 1', () => {
			expect(run(['--size', '8', '--set', '8,0,1'])).toBe(1)
			expect(error).toHaveBeenCalledWith('Error: Coordinates (8, 0) out of bounds for 8x8 frame')
			expect(log).not.toHaveBeenCalled()
		})

		it('should report usage errors with exit code 1', () => {
			expect(run(['--color', '0,0,#123456'])).toBe(1)
			expect(error).toHaveBeenCalledWith('Error: Color 0x123456 is not in the palette')

			expect(run(['-s', '4', '--load', '00'])).toBe(1)
			expect(error).toHaveBeenCalledWith('Error: Expected 4 bytes for 4x4 frame, got 1')
		})

		it('should show help and version', () => {
			expect(run(['--help'])).toBe(0)
			expect(log).toHaveBeenCalledWith(HELP)

			expect(run(['--version'])).toBe(0)
			expect(log).toHaveBeenCalledWith('pixelframe v0.1.0')
		})

		it('should write output to a file', () => {
			const dir = mkdtempSync(join(tmpdir(), 'pixelframe-'))
			try {
				const out = join(dir, 'frame.hex')
				expect(run(['-s', '4', '--set', '3,3,2', '--format', 'hex', '-o', out])).toBe(0)

				expect(readFileSync(out, 'utf8')).toBe('00000080\n')
				expect(log).toHaveBeenCalledWith(`Wrote ${out} (9 B)`)
			} finally {
				rmSync(dir, { recursive: true, force: true })
			}
		})
	})
})
