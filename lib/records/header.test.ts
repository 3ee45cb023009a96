import { expect } from "chai";

import { flags } from "../constants.js";
import { DecodeError, EndOfStreamError } from "../errors.js";
import { BufferReader } from "../utils/reader.js";
import { create_gzip_header } from "../__mocks__/header.js";
import { has_flag, parse_gzip_header } from "./header.js";


describe("parse_gzip_header()", function(){
  it("parses a header without optional fields", function(){
    let r = new BufferReader(Buffer.concat([
      create_gzip_header({mtime: 1700000000, extra_flags: 2, os: 3}),
      Buffer.from("payload"),
    ]));
    expect(parse_gzip_header(r)).to.deep.equal({
      method: 8,
      flags: 0,
      mtime: 1700000000,
      extra_flags: 2,
      os: 3,
      extra_subfield_count: 0,
      name: undefined,
      comment: undefined,
      header_crc: undefined,
    });
    expect(r.position).to.equal(10);
  });

  it("parses a header with a file name", function(){
    let r = new BufferReader(Buffer.from("1f8b0808000000000003612e74787400", "hex"));
    expect(parse_gzip_header(r)).to.deep.equal({
      method: 8,
      flags: 0x08,
      mtime: 0,
      extra_flags: 0,
      os: 3,
      extra_subfield_count: 0,
      name: "a.txt",
      comment: undefined,
      header_crc: undefined,
    });
    expect(r.position).to.equal(16);
  });

  it("reads back an encoded header", function(){
    let h = parse_gzip_header(new BufferReader(create_gzip_header({name: "x", mtime: 42, os: 0, extra_flags: 4})));
    expect(h).to.deep.equal({
      method: 8,
      flags: flags.FNAME,
      mtime: 42,
      extra_flags: 4,
      os: 0,
      extra_subfield_count: 0,
      name: "x",
      comment: undefined,
      header_crc: undefined,
    });
  });

  it("parses every optional field in order", function(){
    let b = create_gzip_header({
      flags: flags.FTEXT,
      extra: new Map([[0x4150, Buffer.from([1, 2])]]),
      name: "a.txt",
      comment: "hello",
      header_crc: 0xbeef,
    });
    let r = new BufferReader(Buffer.concat([b, Buffer.from([0xaa])]));
    let h = parse_gzip_header(r);
    expect(h).to.have.property("flags", 0x1f);
    expect(h).to.have.property("extra_subfield_count", 1);
    expect(h).to.have.property("name", "a.txt");
    expect(h).to.have.property("comment", "hello");
    expect(h).to.have.property("header_crc", 0xbeef);
    expect(r.position).to.equal(b.length);
    expect(r.read_byte()).to.equal(0xaa);
  });

  it("reads nothing more for FTEXT", function(){
    let r = new BufferReader(Buffer.concat([create_gzip_header({flags: flags.FTEXT}), Buffer.from([0x00])]));
    let h = parse_gzip_header(r);
    expect(h).to.have.property("flags", flags.FTEXT);
    expect(h.name).to.be.undefined;
    expect(r.position).to.equal(10);
  });

  it("keeps reserved flag bits", function(){
    let h = parse_gzip_header(new BufferReader(create_gzip_header({flags: flags.RESERVED_BIT_7})));
    expect(h).to.have.property("flags", 0x80);
  });

  it("reports an empty name as an empty string", function(){
    let h = parse_gzip_header(new BufferReader(create_gzip_header({name: ""})));
    expect(h).to.have.property("name", "");
  });

  it("returns a frozen header", function(){
    let h = parse_gzip_header(new BufferReader(create_gzip_header()));
    expect(Object.isFrozen(h)).to.be.true;
  });

  describe("errors", function(){
    function decode(b :Buffer){
      return ()=> parse_gzip_header(new BufferReader(b));
    }

    it("rejects a wrong magic", function(){
      expect(decode(Buffer.from("1f8c0800000000000003", "hex")))
        .to.throw(DecodeError, "magic mismatch: expected 0x1f8b, found 0x1f8c")
        .with.property("code", "MAGIC_MISMATCH");
    });

    it("reports an empty stream as truncated", function(){
      expect(decode(Buffer.alloc(0))).to.throw(DecodeError).with.property("code", "TRUNCATED_HEADER");
      expect(decode(Buffer.from([0x1f]))).to.throw(DecodeError).with.property("code", "TRUNCATED_HEADER");
    });

    it("checks the magic only once the fixed header is read", function(){
      expect(decode(Buffer.from("0000", "hex"))).to.throw(DecodeError).with.property("code", "TRUNCATED_HEADER");
      expect(decode(create_gzip_header().subarray(0, 9))).to.throw(DecodeError).with.property("code", "TRUNCATED_HEADER");
    });

    it("keeps the reader's error as cause", function(){
      expect(decode(Buffer.from([0x1f, 0x8b]))).to.throw(DecodeError)
        .with.property("cause").that.is.instanceOf(EndOfStreamError);
    });

    it("propagates a malformed extra field", function(){
      let b = Buffer.concat([create_gzip_header({flags: flags.FEXTRA}), Buffer.from("0300", "hex")]);
      expect(decode(b)).to.throw(DecodeError).with.property("code", "MALFORMED_EXTRA");
    });

    it("rejects a file name that is not UTF-8", function(){
      let b = Buffer.concat([create_gzip_header({flags: flags.FNAME}), Buffer.from([0xff, 0x00])]);
      expect(decode(b)).to.throw(DecodeError).with.property("code", "INVALID_TEXT");
    });

    it("fails on an unterminated comment", function(){
      let b = Buffer.concat([create_gzip_header({flags: flags.FCOMMENT}), Buffer.from("abc")]);
      expect(decode(b)).to.throw(DecodeError).with.property("code", "TRUNCATED_HEADER");
    });

    it("fails on a truncated header CRC", function(){
      let b = create_gzip_header({header_crc: 1});
      expect(decode(b.subarray(0, b.length - 1))).to.throw(DecodeError).with.property("code", "TRUNCATED_HEADER");
    });
  });
});

describe("has_flag()", function(){
  it("checks header flags", function(){
    let h = parse_gzip_header(new BufferReader(create_gzip_header({name: "a", flags: flags.FTEXT})));
    expect(has_flag(h, flags.FNAME)).to.be.true;
    expect(has_flag(h, flags.FTEXT)).to.be.true;
    expect(has_flag(h, flags.FCOMMENT)).to.be.false;
    expect(has_flag(h, flags.FNAME | flags.FHCRC)).to.be.false;
  });
});
