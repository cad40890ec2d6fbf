import { assert, describe, test } from "@unified-ui/testkit";
import { iur } from "../../../iur/factories.js";
import { createStyle } from "../../../style/style.js";
import { extractHandlers } from "../events.js";
import { escapeHtml } from "../html.js";
import { createWebRenderer } from "../renderer.js";

function html(tree: unknown, warnings: string[] = []): string | null {
  const result = createWebRenderer({ warn: (message) => warnings.push(message) }).render(tree);
  assert.ok(result.ok);
  return result.value.root;
}

describe("web renderer: widgets", () => {
  test("text is escaped and styled inline", () => {
    const style = createStyle({ fg: "red", attrs: ["bold"] });
    assert.equal(
      html(iur.text("a & b", { id: "t", style })),
      '<span id="t" style="color: red; font-weight: bold">a &amp; b</span>',
    );
    assert.equal(
      html(iur.text("x", { style: createStyle({ fg: [1, 2, 3], attrs: ["dim"] }) })),
      '<span style="color: rgb(1, 2, 3); opacity: 0.7">x</span>',
    );
  });

  test("attribute values are escaped", () => {
    assert.equal(html(iur.text("x", { id: 'a"b' })), '<span id="a&quot;b">x</span>');
    assert.equal(escapeHtml(`<'&">`), "&lt;&#39;&amp;&quot;&gt;");
  });

  test("buttons carry dashed handler names and drop false flags", () => {
    assert.equal(
      html(iur.button("Save", { id: "save", onClick: "save_clicked" })),
      '<button id="save" data-on-click="save-clicked">Save</button>',
    );
    assert.equal(html(iur.button("X", { disabled: true })), '<button disabled="true">X</button>');
  });

  test("labels and inputs", () => {
    assert.equal(html(iur.label("Name", { for: "name" })), '<label for="name">Name</label>');
    assert.equal(
      html(
        iur.textInput({
          id: "email",
          inputType: "email",
          placeholder: "you@example.com",
          onChange: { signal: "email_changed" },
          formId: "signup",
        }),
      ),
      '<input id="email" name="email" type="email" placeholder="you@example.com" data-on-change="email-changed" form="signup" />',
    );
  });

  test("charts render as preformatted text", () => {
    assert.equal(
      html(iur.gauge(50, { id: "g" })),
      `<pre id="g" data-kind="gauge">[${"=".repeat(10)}${" ".repeat(10)}] 50/100</pre>`,
    );
    assert.equal(html(iur.sparkline([1, 1])), '<pre data-kind="sparkline">__</pre>');
  });
});

describe("web renderer: tables", () => {
  test("header marks the sort column and the selected row", () => {
    const table = iur.table([{ name: "<b>", qty: 2 }], {
      id: "t",
      columns: [
        iur.column("name", { header: "Name" }),
        iur.column("qty", { header: "Qty", align: "right", sortable: false }),
      ],
      sortColumn: "name",
      selectedRow: 0,
      onRowSelect: "row_selected",
    });
    assert.equal(
      html(table),
      '<table id="t" data-on-row-select="row-selected"><thead><tr>' +
        '<th style="text-align: left" data-sort-key="name">Name ↑</th>' +
        '<th style="text-align: right">Qty</th>' +
        "</tr></thead><tbody>" +
        '<tr aria-selected="true"><td style="text-align: left">&lt;b&gt;</td><td style="text-align: right">2</td></tr>' +
        "</tbody></table>",
    );
  });

  test("no columns", () => {
    assert.equal(html(iur.table([], { id: "e" })), '<pre id="e">No columns defined</pre>');
  });
});

describe("web renderer: menus, tabs and trees", () => {
  test("menus list items; disabled items lose their click handler", () => {
    const menu = iur.menu(
      [
        iur.menuItem("Open", { id: "open", action: "open_file" }),
        iur.menuItem("Gone", { disabled: true, action: "gone" }),
        iur.menuItem("More", { submenu: [iur.menuItem("a")] }),
      ],
      { id: "m", title: "File", position: "top" },
    );
    assert.equal(
      html(menu),
      '<nav id="m" data-position="top"><div class="menu-title">── File ──</div><ul role="menu">' +
        '<li id="open" role="menuitem" data-on-click="open-file">Open</li>' +
        '<li role="menuitem" aria-disabled="true">× Gone</li>' +
        '<li role="menuitem" aria-haspopup="true">More &gt;</li>' +
        "</ul></nav>",
    );
  });

  test("context menus dash their trigger", () => {
    assert.equal(
      html(iur.contextMenu([], { id: "cm", triggerOn: "long_press" })),
      '<ul id="cm" role="menu" data-trigger="long-press"></ul>',
    );
  });

  test("tabs render a tablist and the active panel", () => {
    const tabs = iur.tabs(
      [iur.tab("One", { id: "one", content: iur.text("first") }), iur.tab("Two", { id: "two", disabled: true })],
      { id: "tabs", activeTab: "one", onChange: "tab_changed" },
    );
    assert.equal(
      html(tabs),
      '<div id="tabs" data-active-tab="one">' +
        '<div role="tablist" data-on-change="tab-changed">' +
        '<button id="one" role="tab">One</button><button id="two" role="tab" disabled="true">(×) Two</button>' +
        "</div>" +
        '<div role="tabpanel" aria-labelledby="one"><span>first</span></div>' +
        "</div>",
    );
  });

  test("expanded tree nodes nest a group", () => {
    const tree = iur.treeView(
      [iur.treeNode("src", { id: "src", expanded: true, children: [iur.treeNode("a.ts")] })],
      { id: "tree", onSelect: "picked" },
    );
    assert.equal(
      html(tree),
      '<ul id="tree" role="tree" data-on-select="picked">' +
        '<li id="src" role="treeitem" aria-expanded="true">[-] src<ul role="group"><li role="treeitem">    a.ts</li></ul></li>' +
        "</ul>",
    );
  });
});

describe("web renderer: layout", () => {
  test("boxes are flex containers", () => {
    const box = iur.hbox([iur.text("a")], {
      spacing: 4,
      alignItems: "center",
      justifyContent: "space_between",
      style: createStyle({ bg: "blue" }),
    });
    assert.equal(
      html(box),
      '<div style="display: flex; flex-direction: row; gap: 4px; align-items: center; justify-content: space-between; background-color: blue"><span>a</span></div>',
    );
  });

  test("hidden children are omitted", () => {
    assert.equal(
      html(iur.vbox([iur.text("a"), iur.text("b", { visible: false })], { padding: 0 })),
      '<div style="display: flex; flex-direction: column; padding: 0px"><span>a</span></div>',
    );
  });

  test("unknown roots become an empty span with a warning; hidden roots render nothing", () => {
    const warnings: string[] = [];
    assert.equal(html({ type: "slider" }, warnings), "<span></span>");
    assert.deepEqual(warnings, ['[unified-ui][web] unknown node kind "slider" rendered as an empty span']);
    assert.equal(html(iur.text("x", { visible: false })), null);
  });
});

describe("web extractHandlers", () => {
  test("reads data-on attributes back per element id", () => {
    const page = iur.vbox([
      iur.button("Save", { id: "save", onClick: "save_clicked" }),
      iur.textInput({ id: "email", onChange: "email_changed" }),
      iur.textInput({ id: "plain" }),
      iur.table([{ a: 1 }], { id: "t", onRowSelect: "row_selected", onSort: "sorted" }),
      iur.tabs([iur.tab("One", { id: "one" })], { id: "tabs", onChange: "tab_changed" }),
      iur.treeView([], { id: "tree", onSelect: "picked" }),
    ]);
    assert.deepEqual(extractHandlers(html(page)), {
      save: { onClick: "save-clicked" },
      email: { onChange: "email-changed" },
      plain: {},
      t: { onSort: "sorted", onRowSelect: "row-selected" },
      tree: { onSelect: "picked" },
    });
  });

  test("attribute values are unescaped", () => {
    assert.deepEqual(extractHandlers('<button id="x" data-on-click="a&amp;b">'), { x: { onClick: "a&b" } });
    assert.deepEqual(extractHandlers(null), {});
  });
});

describe("web renderer update", () => {
  const renderer = createWebRenderer({ warn: () => undefined });
  const first = iur.vbox([iur.text("A")]);

  function initial() {
    const rendered = renderer.render(first, { theme: "dark" });
    assert.ok(rendered.ok);
    assert.equal(rendered.value.version, 0);
    return rendered.value;
  }

  test("hidden children are absent from the rendered container", () => {
    assert.equal(
      html(iur.vbox([iur.text("A"), iur.text("B", { visible: false })])),
      '<div style="display: flex; flex-direction: column"><span>A</span></div>',
    );
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
