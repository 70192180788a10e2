/**
 * Hash utilities for fingerprinting canonical tree text
 */

/**
 * FNV-1a over the UTF-16 code units of a string, 64-bit, kept as two 32-bit halves.
 * See: http://www.isthe.com/chongo/tech/comp/fnv/
 */
export function fnv1a64(text: string): [high: number, low: number] {
	let high = 0xcbf29ce4;
	let low = 0x84222325;

	const mix = (byte: number): void => {
		low = (low ^ byte) >>> 0;
		// prime = 2^40 + 0x1b3: low * 0x1b3 plus the 2^40 shift folded into the high half
		const productLow = low * 0x1b3;
		const carry = Math.floor(productLow / 0x100000000);
		const nextHigh = (Math.imul(high, 0x1b3) + Math.imul(low, 0x100) + carry) >>> 0;
		low = productLow >>> 0;
		high = nextHigh;
	};

	for (let i = 0; i < text.length; i++) {
		const unit = text.charCodeAt(i);
		mix(unit & 0xff);
		if (unit > 0xff) {
			mix(unit >>> 8);
		}
	}

	return [high >>> 0, low >>> 0];
}

/**
 * Stable 16-character lowercase hex digest of a string.
 */
export function hashText(text: string): string {
	const [high, low] = fnv1a64(text);
	return high.toString(16).padStart(8, '0') + low.toString(16).padStart(8, '0');
}
