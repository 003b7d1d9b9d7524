/**
 * 테스트용 In-process Page Driver
 *
 * - FakeNode 트리를 DOM 대신 사용
 * - SelectorSpec을 직접 매칭 (CSS 변환 없음)
 */

import type { SelectorSpec } from "@/core/domain/SelectorSpec";
import type {
  ActionResult,
  CapturedResponse,
  IElementHandle,
  IPageDriver,
  JsonValue,
  ResponseListener,
} from "@/core/interfaces";

export interface FakeNodeInit {
  tag?: string;
  className?: string;
  attrs?: Record<string, string>;
  text?: string;
  html?: string;
  visible?: boolean;
  disabled?: boolean;
  failClick?: boolean;
  /** click 시 예외 (분리된 요소 등) */
  clickError?: string;
  /** text() 호출 시 예외 */
  textError?: string;
  onClick?: () => void;
  children?: FakeNodeInit[];
}

export class FakeNode implements IElementHandle {
  readonly tag: string;
  readonly className: string;
  readonly attrs: Record<string, string>;
  readonly ownText: string;
  readonly html: string;
  readonly visible: boolean;
  readonly disabled: boolean;
  readonly failClick: boolean;
  readonly clickError?: string;
  readonly textError?: string;
  readonly onClick?: () => void;
  readonly children: FakeNode[];

  constructor(init: FakeNodeInit = {}) {
    this.tag = init.tag ?? "div";
    this.className = init.className ?? "";
    this.attrs = init.attrs ?? {};
    this.ownText = init.text ?? "";
    this.html = init.html ?? "";
    this.visible = init.visible ?? true;
    this.disabled = init.disabled ?? false;
    this.failClick = init.failClick ?? false;
    this.clickError = init.clickError;
    this.textError = init.textError;
    this.onClick = init.onClick;
    this.children = (init.children ?? []).map((child) => new FakeNode(child));
  }

  get fullText(): string {
    return [this.ownText, ...this.children.map((child) => child.fullText)]
      .filter((part) => part.length > 0)
      .join(" ");
  }

  get fullHtml(): string {
    return [this.html, ...this.children.map((child) => child.fullHtml), this.ownText].join("");
  }

  async text(): Promise<string> {
    if (this.textError) {
      throw new Error(this.textError);
    }
    return this.fullText;
  }

  async attribute(name: string): Promise<string | null> {
    return this.attrs[name] ?? null;
  }

  async innerHtml(): Promise<string> {
    return this.fullHtml;
  }

  async childCount(): Promise<number> {
    return this.children.length;
  }

  async isActionable(): Promise<boolean> {
    return this.visible && !this.disabled;
  }

  async findAll(spec: SelectorSpec): Promise<IElementHandle[]> {
    return this.descendants().filter((node) => node.matches(spec));
  }

  /** 하위 요소 (DOM 순서, 자신 제외) */
  descendants(): FakeNode[] {
    const result: FakeNode[] = [];
    for (const child of this.children) {
      result.push(child, ...child.descendants());
    }
    return result;
  }

  matches(spec: SelectorSpec): boolean {
    if (!this.matchesBase(spec)) {
      return false;
    }
    if (
      spec.containsText &&
      !this.fullText.toLowerCase().includes(spec.containsText.toLowerCase())
    ) {
      return false;
    }
    const descendantSpec = spec.hasDescendant;
    if (descendantSpec && !this.descendants().some((node) => node.matches(descendantSpec))) {
      return false;
    }
    return true;
  }

  private matchesBase(spec: SelectorSpec): boolean {
    switch (spec.kind) {
      case "tag":
        return spec.tag === "*" || spec.tag === this.tag;
      case "classContains":
        return (
          (spec.tag === undefined || spec.tag === this.tag) &&
          this.className.includes(spec.fragment)
        );
      case "attribute": {
        if (spec.tag !== undefined && spec.tag !== this.tag) return false;
        const actual = this.attrs[spec.name];
        if (actual === undefined) return false;
        if (spec.value === undefined) return true;
        const left = spec.ignoreCase ? actual.toLowerCase() : actual;
        const right = spec.ignoreCase ? spec.value.toLowerCase() : spec.value;
        return spec.match === "contains" ? left.includes(right) : left === right;
      }
    }
  }
}

export class FakePageDriver implements IPageDriver {
  private root: FakeNode;
  private url: string;
  private readonly listeners = new Set<ResponseListener>();
  readonly navigations: string[] = [];
  readonly clicks: FakeNode[] = [];
  readonly evaluations: string[] = [];

  /** navigate 결과 큐 (비어 있으면 성공) */
  navigateResults: ActionResult[] = [];
  onNavigate?: (url: string) => void;
  evaluate?: (script: string) => JsonValue;
  /** currentText 호출 시 예외 */
  failText = false;

  constructor(document: FakeNodeInit = {}, url = "https://example.test/") {
    this.root = new FakeNode({ tag: "body", ...document });
    this.url = url;
  }

  setDocument(document: FakeNodeInit): void {
    this.root = new FakeNode({ tag: "body", ...document });
  }

  get document(): FakeNode {
    return this.root;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  emit(response: CapturedResponse): void {
    for (const listener of this.listeners) {
      listener(response);
    }
  }

  async currentText(): Promise<string> {
    if (this.failText) {
      throw new Error("page closed");
    }
    return this.root.fullText;
  }

  currentUrl(): string {
    return this.url;
  }

  async findAll(spec: SelectorSpec): Promise<IElementHandle[]> {
    return [this.root, ...this.root.descendants()].filter((node) => node.matches(spec));
  }

  async click(element: IElementHandle): Promise<ActionResult> {
    if (!(element instanceof FakeNode)) {
      return { ok: false, error: "unknown element" };
    }
    if (element.clickError) {
      throw new Error(element.clickError);
    }
    if (!element.visible || element.disabled || element.failClick) {
      return { ok: false, error: "element is not clickable" };
    }
    this.clicks.push(element);
    element.onClick?.();
    return { ok: true };
  }

  async navigate(url: string): Promise<ActionResult> {
    this.navigations.push(url);
    const result = this.navigateResults.shift() ?? { ok: true };
    if (result.ok) {
      this.url = url;
      this.onNavigate?.(url);
    }
    return result;
  }

  onResponse(listener: ResponseListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async evaluateInPage(script: string): Promise<JsonValue> {
    this.evaluations.push(script);
    return this.evaluate ? this.evaluate(script) : null;
  }

  async pageContent(): Promise<string> {
    return `<body>${this.root.fullHtml}</body>`;
  }
}
