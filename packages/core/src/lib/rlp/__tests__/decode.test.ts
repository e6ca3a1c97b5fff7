import { describe, it, expect } from "vitest";
import { concatBytes, hexToBytes, stringToBytes, toRlp } from "viem";
import { ByteWindow } from "../../bytes/window";
import {
  decodeHeader,
  decodeList,
  decodeListOfSmallStrings,
  decodeString,
  encodedLength,
  fragmentWindow,
} from "../decode";

function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

const failsWith = (code: string) => expect.objectContaining({ code });

// ["dog", ["cat", 4], "hello"]
const nested = toRlp(
  [stringToBytes("dog"), [stringToBytes("cat"), bytes(4)], stringToBytes("hello")],
  "bytes"
);

describe("decodeHeader", () => {
  it("treats bytes below 0x80 as themselves", () => {
    expect(decodeHeader(bytes(0x05))).toEqual({ offset: 0, length: 1, kind: "string" });
  });

  it("decodes short strings", () => {
    expect(decodeHeader(bytes(0x83, 0x64, 0x6f, 0x67))).toEqual({
      offset: 1,
      length: 3,
      kind: "string",
    });
    expect(decodeHeader(bytes(0x80))).toEqual({ offset: 1, length: 0, kind: "string" });
  });

  it("decodes long strings with one and two length bytes", () => {
    const s56 = concatBytes([bytes(0xb8, 0x38), new Uint8Array(56)]);
    expect(decodeHeader(s56)).toEqual({ offset: 2, length: 56, kind: "string" });

    const s256 = concatBytes([bytes(0xb9, 0x01, 0x00), new Uint8Array(256)]);
    expect(decodeHeader(s256)).toEqual({ offset: 3, length: 256, kind: "string" });
  });

  it("decodes short and long lists", () => {
    expect(decodeHeader(bytes(0xc0))).toEqual({ offset: 1, length: 0, kind: "list" });
    const l56 = concatBytes([bytes(0xf8, 0x38), new Uint8Array(56)]);
    expect(decodeHeader(l56)).toEqual({ offset: 2, length: 56, kind: "list" });
  });

  it("rejects more than two length bytes", () => {
    expect(() => decodeHeader(bytes(0xba, 0, 0, 1, 0))).toThrow(
      failsWith("length-of-length-exceeded")
    );
    expect(() => decodeHeader(bytes(0xfb, 0, 0, 0, 1, 0))).toThrow(
      failsWith("length-of-length-exceeded")
    );
  });

  it("rejects truncated input", () => {
    expect(() => decodeHeader(new Uint8Array(0))).toThrow(failsWith("truncated-input"));
    expect(() => decodeHeader(bytes(0x83, 0x61))).toThrow(failsWith("truncated-input"));
    expect(() => decodeHeader(bytes(0xb9, 0x01))).toThrow(failsWith("truncated-input"));
  });

  it("decodes relative to a window", () => {
    const window = ByteWindow.of(bytes(0xff, 0x82, 0x61, 0x62), 1);
    expect(decodeHeader(window)).toEqual({ offset: 1, length: 2, kind: "string" });
  });
});

describe("decodeString", () => {
  it("returns the payload fragment", () => {
    const encoded = bytes(0x83, 0x63, 0x61, 0x74);
    const fragment = decodeString(encoded);
    expect(fragment).toEqual({ offset: 1, length: 3, kind: "string" });
    expect(fragmentWindow(encoded, fragment).toHex()).toBe("0x636174");
  });

  it("rejects lists", () => {
    expect(() => decodeString(bytes(0xc0))).toThrow(failsWith("not-a-string"));
  });
});

describe("decodeList", () => {
  it("decodes a short string and a flat list of single bytes", () => {
    expect(decodeString(bytes(0x82, 0x01, 0x02))).toEqual({ offset: 1, length: 2, kind: "string" });

    const list = decodeList(bytes(0xc2, 0x01, 0x02), 2);
    expect(list.header).toEqual({ offset: 1, length: 2, kind: "list" });
    expect(list.fields).toEqual([
      { offset: 1, length: 1, kind: "string" },
      { offset: 2, length: 1, kind: "string" },
    ]);
  });

  it("decodes a nested list into offsets of the outer window", () => {
    expect(nested).toHaveLength(17);
    expect(nested[0]).toBe(0xd0);

    const list = decodeList(nested, 3);
    expect(list.header).toEqual({ offset: 1, length: 16, kind: "list" });
    expect(list.capacity).toBe(3);
    expect(list.fields).toEqual([
      { offset: 2, length: 3, kind: "string" },
      { offset: 5, length: 6, kind: "list" },
      { offset: 12, length: 5, kind: "string" },
    ]);
  });

  it("keeps list fragments decodable as lists", () => {
    const list = decodeList(nested, 3);
    const inner = fragmentWindow(nested, list.fields[1]);
    const innerList = decodeList(inner, 2);
    // c5 | 83 63 61 74 | 04
    expect(innerList.fields).toEqual([
      { offset: 2, length: 3, kind: "string" },
      { offset: 5, length: 1, kind: "string" },
    ]);
    expect(fragmentWindow(inner, innerList.fields[0]).toHex()).toBe("0x636174");
  });

  it("decodes the empty list", () => {
    expect(decodeList(bytes(0xc0), 4).fields).toEqual([]);
  });

  it("ignores bytes beyond the declared end", () => {
    const padded = concatBytes([toRlp([stringToBytes("a"), stringToBytes("b")], "bytes"), bytes(0xff, 0xff)]);
    expect(decodeList(padded, 2).fields).toHaveLength(2);
    expect(encodedLength(padded)).toBe(3);
  });

  it("rejects fields that overrun the declared payload", () => {
    // Header promises 3 payload bytes; the first field is 4 bytes long.
    expect(() => decodeList(bytes(0xc3, 0x83, 0x61, 0x62, 0x63), 4)).toThrow(
      failsWith("length-mismatch")
    );
  });

  it("rejects more fields than the context allows", () => {
    const three = toRlp([stringToBytes("a"), stringToBytes("b"), stringToBytes("c")], "bytes");
    expect(() => decodeList(three, 2)).toThrow(failsWith("field-count-exceeded"));
    expect(decodeList(three, 3).fields).toHaveLength(3);
  });

  it("rejects strings", () => {
    expect(() => decodeList(bytes(0x83, 0x61, 0x62, 0x63), 4)).toThrow(failsWith("not-a-list"));
  });

  it("decodes long-string fields", () => {
    const long = new Uint8Array(60).fill(0xaa);
    const encoded = toRlp([stringToBytes("k"), long], "bytes");
    const { fields } = decodeList(encoded, 2);
    // f8 3f | 6b | b8 3c <60 bytes>
    expect(fields).toEqual([
      { offset: 2, length: 1, kind: "string" },
      { offset: 5, length: 60, kind: "string" },
    ]);
  });
});

describe("decodeListOfSmallStrings", () => {
  it("decodes single-byte and short string fields", () => {
    const { fields } = decodeListOfSmallStrings(bytes(0xc4, 0x05, 0x80, 0x81, 0x99), 4);
    expect(fields).toEqual([
      { offset: 1, length: 1, kind: "string" },
      { offset: 3, length: 0, kind: "string" },
      { offset: 4, length: 1, kind: "string" },
    ]);
  });

  it("rejects multi-byte string headers", () => {
    const encoded = toRlp([new Uint8Array(56)], "bytes");
    expect(() => decodeListOfSmallStrings(encoded, 4)).toThrow(failsWith("header-too-long"));
  });

  it("rejects nested lists", () => {
    expect(() => decodeListOfSmallStrings(nested, 3)).toThrow(failsWith("not-a-string"));
  });

  it("applies the same exactness and capacity checks", () => {
    expect(() => decodeListOfSmallStrings(bytes(0xc2, 0x83, 0x61, 0x62, 0x63), 4)).toThrow(
      failsWith("length-mismatch")
    );
    expect(() => decodeListOfSmallStrings(bytes(0xc3, 0x01, 0x02, 0x03), 2)).toThrow(
      failsWith("field-count-exceeded")
    );
  });

  it("measures a padded node by its declared length", () => {
    const node = concatBytes([hexToBytes("0xc20102"), new Uint8Array(10)]);
    expect(encodedLength(node)).toBe(3);
    expect(decodeListOfSmallStrings(node, 17).fields).toHaveLength(2);
  });
});
