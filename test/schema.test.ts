import { test } from "tap";
import { ConfigDocumentSchema, EditsSchema } from "../src/schema/base.js";
import { parseDocument } from "../src/parser/parse.js";

test("ConfigDocumentSchema accepts parser output", async (t) => {
  const { document } = parseDocument("; c\n[S]\nA=1 ; one\n[T]\n");

  t.equal(ConfigDocumentSchema.safeParse(document).success, true);
});

test("ConfigDocumentSchema rejects negative source lines", async (t) => {
  const result = ConfigDocumentSchema.safeParse({
    sections: [{ name: "S", comment: "", sourceLine: -1, entries: [] }],
  });

  t.equal(result.success, false);
});

test("EditsSchema accepts nested string maps only", async (t) => {
  t.equal(EditsSchema.safeParse({ S: { A: "1" } }).success, true);
  t.equal(EditsSchema.safeParse({}).success, true);
  t.equal(EditsSchema.safeParse({ S: { A: 1 } }).success, false);
  t.equal(EditsSchema.safeParse({ S: "A=1" }).success, false);
  t.equal(EditsSchema.safeParse(null).success, false);
});
