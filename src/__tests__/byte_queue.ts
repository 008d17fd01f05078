import * as ip from "..";

describe("ByteQueue", () => {
    test("push and shift", () => {
        const q = new ip.ByteQueue(2);
        q.push(new Uint8Array([1, 2, 3]));
        q.pushByte(4);
        expect(q.length).toStrictEqual(4);
        expect(q.data()).toStrictEqual(new Uint8Array([1, 2, 3, 4]));

        q.shift(3);
        expect(q.data()).toStrictEqual(new Uint8Array([4]));
        q.push(new Uint8Array([5, 6, 7, 8, 9]));
        expect(q.data()).toStrictEqual(new Uint8Array([4, 5, 6, 7, 8, 9]));

        q.shift(100);
        expect(q.length).toStrictEqual(0);
    });

    test("ascii text", () => {
        const q = new ip.ByteQueue(1);
        q.pushAscii("{}");
        expect(q.data()).toStrictEqual(new Uint8Array([0x7b, 0x7d]));
        q.clear();
        expect(q.length).toStrictEqual(0);
    });

    test("data is a copy, view is not", () => {
        const q = new ip.ByteQueue(8);
        q.push(new Uint8Array([1, 2]));
        const copy = q.data();
        const view = q.view();
        copy[0] = 9;
        expect(q.data()).toStrictEqual(new Uint8Array([1, 2]));
        view[0] = 9;
        expect(q.data()).toStrictEqual(new Uint8Array([9, 2]));
    });
});
