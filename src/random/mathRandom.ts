import type { IRandomSource } from "../core/interfaces";

export class MathRandomSource implements IRandomSource {
  intn(n: number): number {
    return Math.floor(Math.random() * n);
  }
}
