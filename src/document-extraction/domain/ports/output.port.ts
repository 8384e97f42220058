export interface OutputPort {
  /**
   * Print a line for the user on standard output
   */
  print(message: string): void;
}
