const POLYNOMIAL = 0xedb88320;

const TABLE = createTable();

function createTable(): Uint32Array {
    const table = new Uint32Array(256);

    for (let index = 0; index < 256; index += 1) {
        let value = index;

        for (let bit = 0; bit < 8; bit += 1) {
            value = (value & 1) !== 0 ? POLYNOMIAL ^ (value >>> 1) : value >>> 1;
        }

        table[index] = value >>> 0;
    }

    return table;
}

/**
 * Incremental CRC-32 (IEEE 802.3, the variant stored in ZIP headers).
 * Feeding the same bytes in any number of chunks yields the same digest.
 */
export class Crc32 {
    private state = 0xffffffff;

    update(chunk: Uint8Array): this {
        let crc = this.state;

        for (const byte of chunk) {
            crc = (TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
        }

        this.state = crc >>> 0;

        return this;
    }

    digest(): number {
        return (this.state ^ 0xffffffff) >>> 0;
    }
}

export function crc32(data: Uint8Array): number {
    return new Crc32().update(data).digest();
}

export function formatChecksum(value: number): string {
    return value.toString(16).padStart(8, "0");
}
