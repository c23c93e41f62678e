import { describe, expect, it } from "vitest";
import * as fc from "fast-check";

import { CapacityManager } from "../capacity_manager.ts";
import { Scalar } from "../scalar.ts";
import { TextBuffer } from "../text_buffer.ts";
import {
  BoundaryError,
  MalformedSequenceError,
  StaleViewError,
} from "../text_errors.ts";
import { TextView } from "../text_view.ts";
import { expectErr, expectOk } from "./result_helpers.ts";

const view = (text: string) => TextView.from(text);

describe("TextBuffer", () => {
  describe("construction", () => {
    it("starts empty with no capacity", () => {
      const buffer = new TextBuffer();
      expect(buffer.len()).toBe(0);
      expect(buffer.capacity()).toBe(0);
      expect(buffer.isEmpty()).toBe(true);
      expect(buffer.toString()).toBe("");
    });

    it("withCapacity preallocates", () => {
      const buffer = TextBuffer.withCapacity(16);
      expect(buffer.len()).toBe(0);
      expect(buffer.capacity()).toBe(16);
      buffer.pushView(view("sixteen bytes!!!"));
      expect(buffer.growthStats().reallocations).toBe(0);
    });

    it("withCapacity rejects invalid sizes", () => {
      expect(() => TextBuffer.withCapacity(-1)).toThrow(RangeError);
      expect(() => TextBuffer.withCapacity(1.5)).toThrow(
        "Capacity must be a non-negative integer. Got 1.5",
      );
    });

    it("fromView copies into independent storage", () => {
      const source = TextBuffer.from("abc");
      const copy = TextBuffer.fromView(source.asView());
      source.clear();
      expect(copy.toString()).toBe("abc");
      expect(copy.len()).toBe(3);
    });

    it("fromBytes validates", () => {
      const buffer = expectOk(
        TextBuffer.fromBytes(new Uint8Array([0xc3, 0xa9])),
      );
      expect(buffer.toString()).toBe("é");
      const error = expectErr(
        TextBuffer.fromBytes(new Uint8Array([0x61, 0xed, 0xa0, 0x80])),
        MalformedSequenceError,
      );
      expect(error.reason).toBe("surrogate");
      expect(error.validUpTo).toBe(1);
    });

    it("fromBytesLossy substitutes U+FFFD", () => {
      const buffer = TextBuffer.fromBytesLossy(new Uint8Array([0x68, 0xc3]));
      expect(buffer.toString()).toBe("h\ufffd");
      expect(buffer.len()).toBe(4);
    });
  });

  describe("push", () => {
    it("builds text from scalars and views", () => {
      const buffer = TextBuffer.from("Hello");
      buffer.push(Scalar.of(","));
      buffer.pushView(view(" Rust!"));
      expect(buffer.asView().toBytes()).toEqual(
        new TextEncoder().encode("Hello, Rust!"),
      );
      expect(buffer.toString()).toBe("Hello, Rust!");
    });

    it("encodes multi-byte scalars", () => {
      const buffer = new TextBuffer();
      buffer.push(Scalar.of("€"));
      buffer.push(Scalar.of("\u{1f980}"));
      expect(buffer.len()).toBe(7);
      expect(buffer.asView().charCount()).toBe(2);
    });

    it("allocates exactly the first push, then doubles", () => {
      const buffer = new TextBuffer();
      buffer.push(Scalar.of("a"));
      expect(buffer.capacity()).toBe(1);
      buffer.push(Scalar.of("b"));
      expect(buffer.capacity()).toBe(2);
      buffer.push(Scalar.of("c"));
      expect(buffer.capacity()).toBe(4);
    });

    it("reallocates a logarithmic number of times", () => {
      const buffer = new TextBuffer();
      const a = Scalar.of("a");
      for (let i = 0; i < 1000; i++) {
        buffer.push(a);
      }
      expect(buffer.len()).toBe(1000);
      expect(buffer.capacity()).toBe(1024);
      expect(buffer.growthStats()).toEqual({
        reallocations: 11,
        bytesCopied: 1023,
      });
    });

    it("appends a view of itself", () => {
      const buffer = TextBuffer.from("ab");
      buffer.pushView(buffer.asView());
      expect(buffer.toString()).toBe("abab");
    });

    it("pools statistics through a shared capacity manager", () => {
      const capacityManager = new CapacityManager();
      const first = new TextBuffer({ capacityManager });
      const second = new TextBuffer({ capacityManager });
      first.push(Scalar.of("x"));
      second.push(Scalar.of("y"));
      expect(capacityManager.stats().reallocations).toBe(2);
    });
  });

  describe("editing", () => {
    it("pop removes whole scalars", () => {
      const buffer = TextBuffer.from("hé");
      expect(buffer.pop()?.toString()).toBe("é");
      expect(buffer.len()).toBe(1);
      expect(buffer.pop()?.toString()).toBe("h");
      expect(buffer.pop()).toBeUndefined();
    });

    it("insertView inserts at a boundary", () => {
      const buffer = TextBuffer.from("hé!");
      expectOk(buffer.insertView(1, view("X")));
      expect(buffer.toString()).toBe("hXé!");
      expectOk(buffer.insertView(buffer.len(), view("?")));
      expect(buffer.toString()).toBe("hXé!?");
    });

    it("insertView rejects offsets inside a scalar", () => {
      const buffer = TextBuffer.from("hé!");
      const error = expectErr(buffer.insertView(2, view("X")), BoundaryError);
      expect(error.message).toBe("Range start 2 is not a scalar boundary");
      expect(buffer.toString()).toBe("hé!");
    });

    it("replaceRange swaps a byte range", () => {
      const buffer = TextBuffer.from("hé!");
      expectOk(buffer.replaceRange(1, 3, view("e")));
      expect(buffer.toString()).toBe("he!");
      expectOk(buffer.replaceRange(0, 1, view("Thé")));
      expect(buffer.toString()).toBe("Thée!");
    });

    it("replaceRange accepts a view of the buffer itself", () => {
      const buffer = TextBuffer.from("abc");
      expectOk(buffer.replaceRange(1, 2, buffer.asView()));
      expect(buffer.toString()).toBe("aabcc");
    });

    it("leaves content and views untouched when an edit fails", () => {
      const buffer = TextBuffer.from("héllo");
      const before = buffer.asView();
      expectErr(buffer.replaceRange(0, 2, view("x")), BoundaryError);
      expectErr(buffer.replaceRange(0, 9, view("x")), BoundaryError);
      expect(before.isLive()).toBe(true);
      expect(before.toString()).toBe("héllo");
    });

    it("truncate shortens at boundaries only", () => {
      const buffer = TextBuffer.from("héllo");
      expectErr(buffer.truncate(2), BoundaryError);
      expectOk(buffer.truncate(3));
      expect(buffer.toString()).toBe("hé");
      expectOk(buffer.truncate(10));
      expect(buffer.toString()).toBe("hé");
      expectErr(buffer.truncate(-1), BoundaryError);
    });

    it("clear keeps capacity", () => {
      const buffer = TextBuffer.from("abcdef");
      buffer.clear();
      expect(buffer.len()).toBe(0);
      expect(buffer.capacity()).toBe(6);
    });

    it("reserve grows ahead of appends", () => {
      const buffer = new TextBuffer();
      buffer.reserve(10);
      expect(buffer.capacity()).toBe(10);
      buffer.pushView(view("0123456789"));
      expect(buffer.growthStats().reallocations).toBe(1);
      expect(() => buffer.reserve(-2)).toThrow(RangeError);
    });

    it("shrinkToFit drops spare capacity", () => {
      const buffer = TextBuffer.withCapacity(32);
      buffer.pushView(view("abc"));
      buffer.shrinkToFit();
      expect(buffer.capacity()).toBe(3);
      expect(buffer.toString()).toBe("abc");
    });

    it("every mutation invalidates outstanding views", () => {
      const mutations: Array<(buffer: TextBuffer) => void> = [
        (buffer) => buffer.push(Scalar.of("x")),
        (buffer) => buffer.pushView(view("x")),
        (buffer) => buffer.pop(),
        (buffer) => buffer.clear(),
        (buffer) => buffer.reserve(1),
        (buffer) => buffer.shrinkToFit(),
        (buffer) => expectOk(buffer.truncate(1)),
        (buffer) => expectOk(buffer.insertView(0, view("x"))),
      ];
      for (const mutate of mutations) {
        const buffer = TextBuffer.withCapacity(8);
        buffer.pushView(view("ab"));
        const borrowed = buffer.asView();
        mutate(buffer);
        expect(() => borrowed.toString()).toThrow(StaleViewError);
      }
    });

    it("refuses to append a stale view", () => {
      const buffer = TextBuffer.from("ab");
      const stale = buffer.asView();
      buffer.push(Scalar.of("c"));
      expect(() => buffer.pushView(stale)).toThrow(StaleViewError);
      expect(buffer.toString()).toBe("abc");
    });
  });

  describe("replace", () => {
    it("substitutes every occurrence", () => {
      const buffer = TextBuffer.from("I like C++. I use C++.");
      const replaced = buffer.replace(view("C++"), view("Rust"));
      expect(replaced.toString()).toBe("I like Rust. I use Rust.");
      expect(buffer.toString()).toBe("I like C++. I use C++.");
    });

    it("does not count overlapping matches twice", () => {
      expect(TextBuffer.from("aaaa").replace(view("aa"), view("b")).toString())
        .toBe("bb");
      expect(TextBuffer.from("aaa").replace(view("aa"), view("b")).toString())
        .toBe("ba");
    });

    it("inserts around every scalar for an empty needle", () => {
      const replaced = TextBuffer.from("aé").replace(view(""), view("-"));
      expect(replaced.toString()).toBe("-a-é-");
      expect(new TextBuffer().replace(view(""), view("-")).toString()).toBe(
        "-",
      );
    });

    it("returns an equal copy when nothing matches", () => {
      const buffer = TextBuffer.from("abc");
      const replaced = buffer.replace(view("z"), view("y"));
      expect(replaced.toString()).toBe("abc");
      expect(replaced).not.toBe(buffer);
    });

    it("can delete matches", () => {
      expect(TextBuffer.from("a-b-c").replace(view("-"), view("")).toString())
        .toBe("abc");
    });
  });

  it("concatenation is associative", () => {
    fc.assert(
      fc.property(
        fc.fullUnicodeString(),
        fc.fullUnicodeString(),
        fc.fullUnicodeString(),
        (a, b, c) => {
          const left = TextBuffer.from(a);
          left.pushView(view(b));
          left.pushView(view(c));

          const tail = TextBuffer.from(b);
          tail.pushView(view(c));
          const right = TextBuffer.from(a);
          right.pushView(tail.asView());

          expect(left.asView().equals(right.asView())).toBe(true);
        },
      ),
    );
  });
});
