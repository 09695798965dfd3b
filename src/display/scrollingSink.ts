import type { ModuleRegistry } from "../boot/moduleRegistry";
import type { DisplayConfig } from "../config/defaults";
import type { DisplaySink } from "../types/display";
import type { SystemModule } from "../types/module";
import { marqueeWindow, textWidth } from "../utils/marquee";

/**
 * Single-line terminal marquee. Scrolling is deterministic: every frame moves the text
 * `charsPerFrame` cells left, and a scroll ends once the text has fully left the viewport.
 */
export class ScrollingSink implements DisplaySink, SystemModule {
  private text = "";
  private color: string;
  private imageRef?: string;
  private offset = 0;
  private totalCells = 0;
  private scrolling = false;
  private scrollId = 0;
  private timer?: ReturnType<typeof setInterval>;

  constructor(
    private readonly registry: ModuleRegistry,
    private readonly config: DisplayConfig
  ) {
    this.color = config.loadingColor;
  }

  start(): void {
    if (this.timer) return;
    this.updateText(this.config.loadingMessage, this.config.loadingColor, undefined, true);
    this.timer = setInterval(() => this.step(), this.config.frameMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  updateText(text: string, color: string, imageRef: string | undefined, force: boolean): boolean {
    if (this.scrolling && !force) return false;

    this.text = text;
    this.color = color;
    this.imageRef = imageRef;
    this.offset = 0;
    this.totalCells = this.config.viewportWidth + textWidth(text);
    this.scrolling = true;
    this.scrollId += 1;
    this.emitFrame();
    return true;
  }

  isScrolling(): boolean {
    return this.scrolling;
  }

  attachImage(imageRef: string): void {
    this.imageRef = imageRef;
    this.emitFrame();
  }

  currentText(): string {
    return this.text;
  }

  private step(): void {
    if (!this.scrolling) return;

    this.offset = Math.min(this.totalCells, this.offset + this.config.charsPerFrame);
    this.emitFrame();

    if (this.offset >= this.totalCells) {
      this.scrolling = false;
      this.registry.emit("scroll.completed", { scrollId: this.scrollId, ts: Date.now() });
    }
  }

  private emitFrame(): void {
    this.registry.emit("display.frame", {
      visible: marqueeWindow(this.text, this.offset, this.config.viewportWidth),
      color: this.color,
      imageRef: this.imageRef,
      progress: this.totalCells === 0 ? 1 : this.offset / this.totalCells,
      ts: Date.now()
    });
  }
}
