/**
 * Mapping template tests.
 *
 * Run: node --import tsx src/templates/template.test.ts
 *
 * Tests cover:
 *   1. Loading — part splitting, key order, malformed templates
 *   2. Fill — substitution, repeated keys, missing keys
 *   3. Parse — inverse extraction, leading/following literals, repeats
 *   4. Fill/parse agreement on well-formed text
 */

import { strict as assert } from "node:assert";

import {
  Template,
  TemplateFormatError,
  MissingKeyError,
  TemplateParseError,
} from "./template.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

section("Template.load — parts and keys");

test("splits literals and placeholders in order", () => {
  const t = Template.load("Hello, {name}!");
  assert.deepEqual(t.parts, [
    { kind: "literal", raw: "Hello, " },
    { kind: "placeholder", raw: "{name}", key: "name" },
    { kind: "literal", raw: "!" },
  ]);
  assert.deepEqual(t.keys, ["name"]);
});

test("trims surrounding whitespace before parsing", () => {
  const t = Template.load("\n  Review: {review}\n\n");
  assert.equal(t.raw, "Review: {review}");
  assert.equal(t.parts.length, 2);
});

test("keys keep first-occurrence order and appear once", () => {
  const t = Template.load("{b} then {a} then {b}");
  assert.deepEqual(t.keys, ["b", "a"]);
  assert.equal(t.parts.length, 5);
});

test("a single placeholder is a valid template", () => {
  const t = Template.load("{only}");
  assert.deepEqual(t.keys, ["only"]);
  assert.equal(t.parts.length, 1);
});

test("a literal-only template has no keys", () => {
  const t = Template.load("No placeholders here.");
  assert.deepEqual(t.keys, []);
  assert.equal(t.parts[0]?.kind, "literal");
});

test("template is frozen", () => {
  const t = Template.load("A {x}");
  assert.ok(Object.isFrozen(t));
  assert.ok(Object.isFrozen(t.parts));
  assert.ok(Object.isFrozen(t.keys));
});

section("Template.load — malformed templates");

test("adjacent placeholders are rejected", () => {
  assert.throws(() => Template.load("{a}{b}"), TemplateFormatError);
});

test("empty template is rejected", () => {
  assert.throws(() => Template.load(""), (err: unknown) => {
    assert.ok(err instanceof TemplateFormatError);
    assert.equal(err.message, "Template cannot be empty.");
    return true;
  });
});

test("whitespace-only template is rejected", () => {
  assert.throws(() => Template.load("   \n\t "), TemplateFormatError);
});

test("stray opening brace is rejected", () => {
  assert.throws(() => Template.load("Value: { {x}"), TemplateFormatError);
});

test("stray closing brace is rejected", () => {
  assert.throws(() => Template.load("Value: {x} }"), TemplateFormatError);
});

test("empty placeholder name is rejected", () => {
  assert.throws(() => Template.load("Value: {}"), TemplateFormatError);
});

// ═══════════════════════════════════════════════════════════════════════════
// FILL
// ═══════════════════════════════════════════════════════════════════════════

section("Template.fill");

test("substitutes a single value", () => {
  assert.equal(Template.load("Hello, {name}!").fill({ name: "World" }), "Hello, World!");
});

test("substitutes every occurrence of a repeated key", () => {
  const t = Template.load("{x} and again {x}");
  assert.equal(t.fill({ x: "7" }), "7 and again 7");
});

test("ignores values for unknown keys", () => {
  const t = Template.load("Name: {name}");
  assert.equal(t.fill({ name: "Ada", extra: "unused" }), "Name: Ada");
});

test("missing key raises MissingKeyError naming the key", () => {
  const t = Template.load("Name: {name}\nAge: {age}");
  assert.throws(() => t.fill({ name: "Ada" }), (err: unknown) => {
    assert.ok(err instanceof MissingKeyError);
    assert.equal(err.key, "age");
    assert.equal(err.templateRaw, "Name: {name}\nAge: {age}");
    assert.ok(err.message.includes('"age"'));
    return true;
  });
});

test("inherited object properties do not count as values", () => {
  const t = Template.load("Value: {toString}");
  assert.throws(() => t.fill({}), MissingKeyError);
});

test("a value containing a later key's placeholder is substituted again", () => {
  const t = Template.load("{a} / {b}");
  assert.equal(t.fill({ a: "{b}", b: "B" }), "B / B");
});

// ═══════════════════════════════════════════════════════════════════════════
// PARSE
// ═══════════════════════════════════════════════════════════════════════════

section("Template.parse");

test("recovers a value between literals", () => {
  assert.deepEqual(Template.load("Hello, {name}!").parse("Hello, World!"), { name: "World" });
});

test("final placeholder takes the remaining text", () => {
  const t = Template.load("Category: {category}");
  assert.deepEqual(t.parse("Category: Kitchen > Cookware"), { category: "Kitchen > Cookware" });
});

test("surrounding whitespace in the text is trimmed first", () => {
  const t = Template.load("Sentiment: {sentiment}");
  assert.deepEqual(t.parse("\n  Sentiment: positive  \n"), { sentiment: "positive" });
});

test("leading placeholder takes text up to the first literal", () => {
  const t = Template.load("{a} | {b}");
  assert.deepEqual(t.parse("one | two | three"), { a: "one", b: "two | three" });
});

test("multi-line values are recovered", () => {
  const t = Template.load("Summary:\n{summary}\nTags: {tags}");
  assert.deepEqual(t.parse("Summary:\nline one\nline two\nTags: a, b"), {
    summary: "line one\nline two",
    tags: "a, b",
  });
});

test("text after a trailing literal is ignored", () => {
  const t = Template.load("<{value}>");
  assert.deepEqual(t.parse("<42> and some chatter"), { value: "42" });
});

test("literal-only template parses to an empty record", () => {
  assert.deepEqual(Template.load("OK").parse("OK"), {});
});

test("missing leading literal raises TemplateParseError", () => {
  const t = Template.load("Answer: {answer}");
  assert.throws(() => t.parse("I think the answer is 4"), (err: unknown) => {
    assert.ok(err instanceof TemplateParseError);
    assert.equal(err.message, "Expected 'Answer: ' at start of text 'I think the answer is 4'.");
    return true;
  });
});

test("missing following literal raises TemplateParseError", () => {
  const t = Template.load("A: {a}\nB: {b}");
  assert.throws(() => t.parse("A: 1 B: 2"), (err: unknown) => {
    assert.ok(err instanceof TemplateParseError);
    assert.equal(err.message, "Expected '\nB: ' in text '1 B: 2'.");
    return true;
  });
});

test("repeated placeholder keeps the value bound last", () => {
  const t = Template.load("{x} vs {x}.");
  assert.deepEqual(t.parse("first vs second."), { x: "second" });
});

test("repeated placeholder keeps its first-occurrence position", () => {
  const t = Template.load("{x}, {y}, {x}!");
  const parsed = t.parse("1, 2, 3!");
  assert.deepEqual(Object.keys(parsed), ["x", "y"]);
  assert.deepEqual(parsed, { x: "3", y: "2" });
});

// ═══════════════════════════════════════════════════════════════════════════
// FILL / PARSE AGREEMENT
// ═══════════════════════════════════════════════════════════════════════════

section("fill → parse");

test("parse inverts fill for separator-free values", () => {
  const t = Template.load("Title: {title}\nAuthor: {author}\nYear: {year}");
  const values = { title: "The Long Road", author: "R. Quill", year: "1987" };
  assert.deepEqual(t.parse(t.fill(values)), values);
});

test("parse inverts fill when the template starts with a placeholder", () => {
  const t = Template.load("{question} => {answer}");
  const values = { question: "2 + 2", answer: "4" };
  assert.deepEqual(t.parse(t.fill(values)), values);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
