import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { PayloadTooLargeError, readBody } from "../../src/server/node-adapter.ts";

describe("readBody", () => {
  it("joins chunks into a UTF-8 string", async () => {
    const source = Readable.from([Buffer.from('{"s_l":'), Buffer.from("5.1}")]);

    await expect(readBody(source, 1024)).resolves.toBe('{"s_l":5.1}');
  });

  it("stops once the body passes the limit", async () => {
    const source = Readable.from(Array.from({ length: 64 }, () => Buffer.alloc(512, 0x61)));

    const error = await readBody(source, 1024).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(PayloadTooLargeError);
    expect(error).toMatchObject({ limitBytes: 1024, message: "Request body exceeds 1024 bytes" });
  });

  it("counts bytes rather than characters", async () => {
    await expect(readBody(Readable.from(["é".repeat(500)]), 1024)).resolves.toBe("é".repeat(500));
    await expect(readBody(Readable.from(["é".repeat(600)]), 1024)).rejects.toBeInstanceOf(
      PayloadTooLargeError,
    );
  });

  it("propagates stream errors", async () => {
    const source = new Readable({
      read() {
        this.destroy(new Error("socket hang up"));
      },
    });

    await expect(readBody(source, 1024)).rejects.toThrow("socket hang up");
  });
});
