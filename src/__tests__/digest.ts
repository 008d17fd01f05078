import * as ip from "..";

const { Sha1Digest } = ip;

function digestWith(first: number, last: number = 0): ip.Sha1Digest {
    const data = new Uint8Array(Sha1Digest.SIZE);
    data[0] = first;
    data[Sha1Digest.SIZE - 1] = last;
    return new Sha1Digest(data);
}

describe("Sha1Digest", () => {
    test("compute", () => {
        expect(Sha1Digest.compute("").toHex()).toStrictEqual("da39a3ee5e6b4b0d3255bfef95601890afd80709");
        expect(Sha1Digest.compute("abc").toHex()).toStrictEqual("a9993e364706816aba3e25717850c26c9cd0d89d");
        expect(Sha1Digest.compute(new TextEncoder().encode("abc")).equals(Sha1Digest.compute("abc")))
            .toStrictEqual(true);
    });

    test("default is all zeroes", () => {
        const d = new Sha1Digest();
        expect(d.isZero()).toStrictEqual(true);
        expect(d.toHex()).toStrictEqual("0".repeat(40));
        expect(d.toString()).toStrictEqual("0".repeat(40));
        expect(d.toBase64()).toStrictEqual("A".repeat(27) + "=");
    });

    test("construction copies the bytes", () => {
        const data = new Uint8Array(20).fill(7);
        const d = new Sha1Digest(data);
        data[0] = 8;
        expect(d.front()).toStrictEqual(7);

        const copy = d.data();
        copy[1] = 9;
        expect(d.at(1)).toStrictEqual(7);

        expect(() => new Sha1Digest(new Uint8Array(19))).toThrow(ip.DigestError);
        expect(() => new Sha1Digest(new Uint8Array(21))).toThrow(ip.DigestError);
    });

    test("ordering", () => {
        const a = digestWith(1, 9);
        const b = digestWith(2);
        const c = digestWith(2, 1);
        expect(a.compare(b)).toStrictEqual(-1);
        expect(b.compare(a)).toStrictEqual(1);
        expect(b.compare(digestWith(2))).toStrictEqual(0);
        expect(a.lessThan(b)).toStrictEqual(true);
        expect(c.greaterThan(b)).toStrictEqual(true);
        expect(b.equals(c)).toStrictEqual(false);
        const sorted = [c, a, b].sort(Sha1Digest.compare).map((d) => d.toHex());
        expect(sorted).toStrictEqual([a.toHex(), b.toHex(), c.toHex()]);
    });

    test("element access", () => {
        const d = digestWith(0xab, 0xcd);
        expect(d.at(0)).toStrictEqual(0xab);
        expect(d.front()).toStrictEqual(0xab);
        expect(d.back()).toStrictEqual(0xcd);
        expect(() => d.at(20)).toThrow(ip.OutOfRangeError);
        expect(() => d.at(-1)).toThrow(ip.OutOfRangeError);
    });

    test("clear and swap", () => {
        const a = digestWith(1);
        const b = digestWith(2);
        a.swap(b);
        expect(a.front()).toStrictEqual(2);
        expect(b.front()).toStrictEqual(1);

        const kept = b.clone();
        b.clear();
        expect(b.isZero()).toStrictEqual(true);
        expect(kept.front()).toStrictEqual(1);
    });

    test("hex and base64", () => {
        const d = Sha1Digest.compute("abc");
        expect(Sha1Digest.fromHex(d.toHex()).equals(d)).toStrictEqual(true);
        expect(Sha1Digest.fromHex("A9993E364706816ABA3E25717850C26C9CD0D89D").equals(d)).toStrictEqual(true);
        expect(Sha1Digest.fromBase64(d.toBase64()).equals(d)).toStrictEqual(true);
        expect(() => Sha1Digest.fromHex("xyz")).toThrow(ip.DigestError);
        expect(() => Sha1Digest.fromBase64("AAAA")).toThrow(ip.DigestError);
        expect(() => Sha1Digest.fromBase64("***")).toThrow(ip.DigestError);
    });
});
