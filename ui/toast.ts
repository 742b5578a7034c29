export type ToastState = {
  message: string;
  visible: boolean;
};

type Listener = (state: ToastState) => void;

export const DEFAULT_DURATION = 2000;

// Single auto-dismissing message. A new show() replaces the current one.
export class Toast {
  private state: ToastState = { message: '', visible: false };
  private timer: ReturnType<typeof setTimeout> | undefined;
  private readonly listeners = new Set<Listener>();

  constructor(private readonly defaultDurationMs = DEFAULT_DURATION) {}

  get current(): ToastState {
    return this.state;
  }

  show(message: string, durationMs = this.defaultDurationMs) {
    this.cancelTimer();
    this.update({ message, visible: true });
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.update({ message: this.state.message, visible: false });
    }, Math.max(0, durationMs));
  }

  hide() {
    this.cancelTimer();
    if (this.state.visible) this.update({ message: this.state.message, visible: false });
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose() {
    this.cancelTimer();
    this.listeners.clear();
  }

  private cancelTimer() {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private update(next: ToastState) {
    this.state = next;
    for (const listener of this.listeners) listener(next);
  }
}
