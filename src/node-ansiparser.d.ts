declare module 'node-ansiparser' {
  namespace AnsiParser {
    /** Callbacks the parser invokes; missing ones are filled with no-ops */
    interface AnsiTerminal {
      inst_p?(text: string): void;
      inst_o?(payload: string): void;
      inst_x?(flag: string): void;
      inst_c?(collected: string, params: number[], flag: string): void;
      inst_e?(collected: string, flag: string): void;
      inst_H?(collected: string, params: number[], flag: string): void;
      inst_P?(data: string): void;
      inst_U?(): void;
      inst_E?(error: unknown): void;
    }
  }

  class AnsiParser {
    constructor(terminal?: AnsiParser.AnsiTerminal);
    parse(input: string): void;
    reset(): void;
  }

  export = AnsiParser;
}
