/**
 * packages/core/src/renderer/labels.ts — Display text for interactive widgets.
 */

import type {
  InputType,
  MenuElement,
  MenuItemElement,
  TabElement,
  TextInputElement,
  TreeNodeElement,
} from "../iur/types.js";

export const EMPTY_INPUT_PLACEHOLDER = "[________________]";

const INPUT_INDICATORS: Readonly<Record<InputType, string>> = Object.freeze({
  text: ":",
  password: "*",
  email: "@",
  number: "#",
  tel: "T",
});

export function inputIndicator(inputType: InputType): string {
  return INPUT_INDICATORS[inputType] ?? ":";
}

export function buttonText(label: string | undefined): string {
  return `[ ${label ?? ""} ]`;
}

/** Live value (masked for passwords), else `[placeholder]`, else an empty field. */
export function inputDisplayValue(
  input: Pick<TextInputElement, "value" | "placeholder" | "inputType">,
): string {
  if (input.value !== undefined) {
    return input.inputType === "password" ? "*".repeat([...input.value].length) : input.value;
  }
  if (input.placeholder !== undefined) return `[${input.placeholder}]`;
  return EMPTY_INPUT_PLACEHOLDER;
}

export function inputText(input: Pick<TextInputElement, "value" | "placeholder" | "inputType">): string {
  return `${inputIndicator(input.inputType)} ${inputDisplayValue(input)}`;
}

export function menuItemText(
  item: Pick<MenuItemElement, "label" | "disabled" | "icon" | "shortcut" | "submenu">,
): string {
  const disabled = item.disabled ? "× " : "";
  const icon = item.icon !== undefined ? `[${item.icon}] ` : "";
  const shortcut = item.shortcut !== undefined ? ` (${item.shortcut})` : "";
  const submenu = item.submenu !== undefined ? " >" : "";
  return `${disabled}${icon}${item.label}${shortcut}${submenu}`;
}

/** Title line, decorated when the menu sits at the top; `undefined` without a title. */
export function menuTitleText(menu: Pick<MenuElement, "title" | "position">): string | undefined {
  if (menu.title === undefined) return undefined;
  return menu.position === "top" ? `── ${menu.title} ──` : menu.title;
}

export function tabText(tab: Pick<TabElement, "label" | "icon" | "disabled" | "closable">): string {
  const disabled = tab.disabled ? "(×) " : "";
  const icon = tab.icon !== undefined ? `[${tab.icon}] ` : "";
  const closable = tab.closable ? " ×" : "";
  return `${disabled}${icon}${tab.label}${closable}`;
}

export function treeNodeText(
  node: Pick<TreeNodeElement, "label" | "expanded" | "icon" | "iconExpanded" | "children">,
): string {
  const marker = node.children !== undefined ? (node.expanded ? "[-] " : "[+] ") : "    ";
  const iconName = node.expanded && node.iconExpanded !== undefined ? node.iconExpanded : node.icon;
  const icon = iconName !== undefined ? `[${iconName}] ` : "";
  return `${marker}${icon}${node.label}`;
}

/** Children shown under a tree node: only while expanded. */
export function visibleTreeChildren(
  node: Pick<TreeNodeElement, "expanded" | "children">,
): readonly TreeNodeElement[] {
  return node.expanded && node.children !== undefined ? node.children : [];
}

/** Content of the tab whose id matches `activeTab`, as a list. */
export function activeTabContent(
  tabs: readonly TabElement[],
  activeTab: string | undefined,
): readonly unknown[] {
  if (activeTab === undefined) return [];
  const active = tabs.find((tab) => tab.id === activeTab);
  if (active === undefined || active.content === undefined) return [];
  const content: unknown = active.content;
  return Array.isArray(content) ? content : [content];
}
