import { assert, describe, test } from "@unified-ui/testkit";
import { iur } from "../../../iur/factories.js";
import { createStyle } from "../../../style/style.js";
import { extractHandlers } from "../events.js";
import { type TerminalNode, collectText, renderPlainText } from "../nodes.js";
import { createTerminalRenderer } from "../renderer.js";

function renderRoot(tree: unknown, warnings: string[] = []): TerminalNode | null {
  const result = createTerminalRenderer({ warn: (message) => warnings.push(message) }).render(tree);
  assert.ok(result.ok);
  return result.value.root;
}

function plain(tree: unknown): string {
  const root = renderRoot(tree);
  assert.ok(root !== null);
  return renderPlainText(root);
}

const form = iur.vbox([
  iur.text("Title", { style: createStyle({ fg: "cyan", attrs: ["bold"], padding: 1 }) }),
  iur.hbox([iur.button("OK", { id: "ok", onClick: "ok_clicked" }), iur.button("Cancel")], { spacing: 1 }),
  iur.textInput({ id: "name", placeholder: "Name" }),
  iur.label("Name", { for: "name" }),
  iur.text("hidden", { visible: false }),
]);

describe("terminal renderer", () => {
  test("lays out stacks as plain text and skips hidden elements", () => {
    assert.equal(plain(form), "Title\n[ OK ] [ Cancel ]\n: [Name]\nName");
  });

  test("styled leaves keep only colors and attributes", () => {
    const root = renderRoot(form);
    assert.ok(root?.kind === "stack");
    assert.deepEqual(root.children[0], {
      kind: "styled",
      node: { kind: "text", content: "Title" },
      style: { fg: "cyan", attrs: ["bold"] },
    });
  });

  test("collectText lists leaves depth-first", () => {
    const root = renderRoot(form);
    assert.ok(root !== null);
    assert.deepEqual(collectText(root), ["Title", "[ OK ]", "[ Cancel ]", ": [Name]", "Name"]);
  });

  test("trees show children of expanded nodes only", () => {
    const tree = iur.treeView([
      iur.treeNode("src", { expanded: true, children: [iur.treeNode("a.ts")] }),
      iur.treeNode("docs", { children: [iur.treeNode("x.md")] }),
    ]);
    assert.equal(plain(tree), "[-] src\n    a.ts\n[+] docs");
  });

  test("tabs show the bar, a blank line and the active content", () => {
    const tabs = iur.tabs(
      [
        iur.tab("One", { id: "one", content: iur.text("first") }),
        iur.tab("Two", { id: "two", closable: true, content: iur.text("second") }),
      ],
      { activeTab: "one" },
    );
    assert.equal(plain(tabs), "One  Two ×\n\nfirst");
  });

  test("menus list a decorated title and their items", () => {
    const menu = iur.menu(
      [
        iur.menuItem("Open", { shortcut: "Ctrl+O" }),
        iur.menuItem("Recent", { submenu: [iur.menuItem("a.txt")] }),
      ],
      { title: "File", position: "top" },
    );
    assert.equal(plain(menu), "── File ──\nOpen (Ctrl+O)\nRecent >");
  });

  test("vertical spacing inserts blank lines", () => {
    assert.equal(plain(iur.vbox([iur.text("a"), iur.text("b")], { spacing: 1 })), "a\n\nb");
  });

  test("unknown nodes render empty with a warning; hidden roots render nothing", () => {
    const warnings: string[] = [];
    assert.deepEqual(renderRoot({ type: "slider" }, warnings), { kind: "empty" });
    assert.deepEqual(warnings, ['[unified-ui][terminal] unknown node kind "slider" rendered empty']);
    assert.equal(renderRoot(iur.text("x", { visible: false })), null);
  });
});

describe("terminal extractHandlers", () => {
  test("collects handlers per id and always lists text inputs", () => {
    const tree = iur.vbox([
      form,
      iur.table([{ a: 1 }], { id: "grid", onSort: "sorted" }),
      iur.menu([iur.menuItem("Open", { id: "open", action: "open_file" })]),
      iur.tabs([iur.tab("One", { id: "one" })], { id: "tabs", onChange: { signal: "tab_changed" } }),
      iur.treeView([], { id: "files", onSelect: "picked", onToggle: "toggled" }),
    ]);
    assert.deepEqual(extractHandlers(renderRoot(tree)), {
      ok: { onClick: "ok_clicked" },
      name: {},
      grid: { onSort: "sorted" },
      open: { action: "open_file" },
      tabs: { onChange: { signal: "tab_changed" } },
      files: { onSelect: "picked", onToggle: "toggled" },
    });
  });

  test("nothing rendered, nothing extracted", () => {
    assert.deepEqual(extractHandlers(null), {});
  });
});

describe("terminal renderer update", () => {
  const renderer = createTerminalRenderer({ warn: () => undefined });
  const first = iur.vbox([iur.text("A")]);

  function initial() {
    const rendered = renderer.render(first, { theme: "dark" });
    assert.ok(rendered.ok);
    assert.equal(rendered.value.version, 0);
    return rendered.value;
  }

  test("hidden children are absent from the rendered container", () => {
    const root = renderRoot(iur.vbox([iur.text("A"), iur.text("B", { visible: false })]));
    if (root === null || root.kind !== "stack") return assert.fail("expected a stack");
    assert.deepEqual(root.children, [{ kind: "text", content: "A" }]);
  });

  test("the same tree and options return the same state object", () => {
    const state = initial();
    const updated = renderer.update(iur.vbox([iur.text("A")]), state, { theme: "dark" });
    assert.ok(updated.ok);
    assert.equal(updated.value, state);
  });

  test("a changed tree bumps the version once and replaces the root", () => {
    const state = initial();
    const updated = renderer.update(iur.vbox([iur.text("B")]), state, { theme: "dark" });
    assert.ok(updated.ok);
    assert.equal(updated.value.version, 1);
    assert.notDeepEqual(updated.value.root, state.root);
  });

  test("a config-only change bumps the version and keeps the root", () => {
    const state = initial();
    const updated = renderer.update(first, state, { theme: "light" });
    assert.ok(updated.ok);
    assert.equal(updated.value.version, 1);
    assert.equal(updated.value.root, state.root);
    assert.deepEqual(updated.value.config, { theme: "light" });
  });
});
