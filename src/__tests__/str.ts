import * as ip from "..";

const { StrView } = ip;

describe("StrView", () => {
    test("element access", () => {
        const s = StrView.from("hello world");
        expect(s.length).toStrictEqual(11);
        expect(s.empty).toStrictEqual(false);
        expect(s.at(0)).toStrictEqual(0x68);
        expect(s.front()).toStrictEqual(0x68);
        expect(s.back()).toStrictEqual(0x64);
        expect(s.byteAt(11)).toStrictEqual(undefined);
        expect(() => s.at(11)).toThrow(ip.OutOfRangeError);
        expect(s.toString()).toStrictEqual("hello world");
        expect([...StrView.from("hi")]).toStrictEqual([0x68, 0x69]);
    });

    test("empty views", () => {
        const s = new StrView();
        expect(s.empty).toStrictEqual(true);
        expect(s.length).toStrictEqual(0);
        expect(s.toString()).toStrictEqual("");
        expect(s.front()).toStrictEqual(undefined);
        expect(s.find("a")).toStrictEqual(StrView.NPOS);
        expect(s.isAlpha()).toStrictEqual(true);
        expect(StrView.from("").empty).toStrictEqual(true);
        expect(() => new StrView(new Uint8Array(2), 3)).toThrow(ip.OutOfRangeError);
    });

    test("the view does not own its bytes", () => {
        const buffer = new Uint8Array([0x61, 0x62, 0x63, 0x00, 0x7a]);
        const s = new StrView(buffer);
        expect(s.toString()).toStrictEqual("abc");
        buffer[1] = 0;
        expect(s.length).toStrictEqual(1);
        expect(s.toString()).toStrictEqual("a");

        const t = new StrView(new Uint8Array([0x78, 0x79, 0x00]));
        t.popBack();
        expect(t.toString()).toStrictEqual("x");

        const u = new StrView(new Uint8Array([0x31, 0x32]));
        expect(u.length).toStrictEqual(2);
        u.clear();
        expect(u.empty).toStrictEqual(true);
    });

    test("search", () => {
        const s = StrView.from("hello world");
        expect(s.find("o")).toStrictEqual(4);
        expect(s.find(0x6f, 5)).toStrictEqual(7);
        expect(s.find("world")).toStrictEqual(6);
        expect(s.find("xyz")).toStrictEqual(StrView.NPOS);
        expect(s.find("o", 12)).toStrictEqual(StrView.NPOS);
        expect(s.rfind("o")).toStrictEqual(7);
        expect(s.rfind("o", 8)).toStrictEqual(StrView.NPOS);
        expect(() => s.rfind("ab")).toThrow(RangeError);
    });

    test("substrings share the buffer", () => {
        const s = StrView.from("key=value");
        expect(s.substr(4).toString()).toStrictEqual("value");
        expect(s.substrFrom("=").toString()).toStrictEqual("=value");
        expect(s.substrAfter("=").toString()).toStrictEqual("value");
        expect(s.substrAfter("#").empty).toStrictEqual(true);
        expect(s.substr(100).empty).toStrictEqual(true);

        const value = s.substrAfter("=");
        s.bytes()[4] = 0x56;
        expect(value.toString()).toStrictEqual("Value");
    });

    test("prefix and suffix", () => {
        const s = StrView.from("hello world");
        expect(s.hasPrefix("hello")).toStrictEqual(true);
        expect(s.hasPrefix("world")).toStrictEqual(false);
        expect(s.hasPrefix(null)).toStrictEqual(false);
        expect(s.hasSuffix("world")).toStrictEqual(true);
        expect(s.hasSuffix(StrView.from("d"))).toStrictEqual(true);
        expect(s.hasSuffix("hello")).toStrictEqual(false);
        expect(s.hasSuffix("hello world!")).toStrictEqual(false);
        expect(s.hasSuffix("")).toStrictEqual(true);
        expect(s.hasSuffix(undefined)).toStrictEqual(false);
    });

    test("comparison", () => {
        const s = StrView.from("abc");
        expect(s.compare("abd")).toStrictEqual(-1);
        expect(s.compare("ab")).toStrictEqual(1);
        expect(s.compare("abcd")).toStrictEqual(-1);
        expect(s.compare(StrView.from("abc"))).toStrictEqual(0);
        expect(s.compare(new Uint8Array([0x61, 0x62, 0x63, 0x00, 0x7a]))).toStrictEqual(0);
        expect(StrView.from("é").compare("z")).toStrictEqual(1);
        expect(s.equals("abc")).toStrictEqual(true);
        expect(s.equals("ABC")).toStrictEqual(false);
    });

    test("copy", () => {
        const s = StrView.from("abc");
        const target = new Uint8Array(5).fill(0xff);
        s.copy(target, 5);
        expect(Array.from(target)).toStrictEqual([0x61, 0x62, 0x63, 0, 0]);

        const short = new Uint8Array(3).fill(0xff);
        s.copy(short, 2, 1);
        expect(Array.from(short)).toStrictEqual([0x62, 0x63, 0xff]);
    });

    test("character classes", () => {
        expect(StrView.from("abc123").isAlnum()).toStrictEqual(true);
        expect(StrView.from("abc123").isAlpha()).toStrictEqual(false);
        expect(StrView.from("abc").isAlpha()).toStrictEqual(true);
        expect(StrView.from("2024").isDigit()).toStrictEqual(true);
        expect(StrView.from(" \t").isBlank()).toStrictEqual(true);
        expect(StrView.from("\n\v").isSpace()).toStrictEqual(true);
        expect(StrView.from("\n\v").isBlank()).toStrictEqual(false);
        expect(StrView.from("ABC").isUpper()).toStrictEqual(true);
        expect(StrView.from("ABC").isLower()).toStrictEqual(false);
        expect(StrView.from("deadBEEF").isXdigit()).toStrictEqual(true);
        expect(StrView.from("deadbeeg").isXdigit()).toStrictEqual(false);
        expect(StrView.from("!?,").isPunct()).toStrictEqual(true);
        expect(StrView.from("\u0001\u007f").isCntrl()).toStrictEqual(true);
        expect(StrView.from("a b").isGraph()).toStrictEqual(false);
        expect(StrView.from("a b").isPrint()).toStrictEqual(true);
        expect(StrView.from("plain").isAscii()).toStrictEqual(true);
        expect(StrView.from("é").isAscii()).toStrictEqual(false);
        expect(StrView.from("é").isAlpha()).toStrictEqual(false);
        expect(StrView.from("x-y").is((b) => b !== 0x20)).toStrictEqual(true);
    });
});

describe("ctype", () => {
    test("single bytes", () => {
        expect(ip.ctype.isXdigit(0x46)).toStrictEqual(true);
        expect(ip.ctype.isXdigit(0x47)).toStrictEqual(false);
        expect(ip.ctype.isSpace(0x0b)).toStrictEqual(true);
        expect(ip.ctype.isPunct(0x5f)).toStrictEqual(true);
        expect(ip.ctype.isPrint(0x7f)).toStrictEqual(false);
        expect(ip.ctype.isAscii(0x80)).toStrictEqual(false);
    });
});
