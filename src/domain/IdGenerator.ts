export type Clock = () => Date;

/**
 * Per-instance id source: `<prefix>_<epochSeconds>_<counter>`
 * The seconds salt keeps ids from separate runs apart; ordering across runs is not guaranteed.
 */
export class IdGenerator {
  private counter: number;

  constructor(
    private readonly prefix: string,
    private readonly clock: Clock = () => new Date(),
    seed = 0
  ) {
    this.counter = seed;
  }

  next(): string {
    this.counter++;
    const seconds = Math.floor(this.clock().getTime() / 1000);
    return `${this.prefix}_${seconds}_${this.counter}`;
  }

  /**
   * Draws until `isTaken` accepts the id, so loaded records are never shadowed
   */
  nextUnique(isTaken: (id: string) => boolean): string {
    let id = this.next();
    while (isTaken(id)) {
      id = this.next();
    }
    return id;
  }
}
