/**
 * nbimport Kernel — Import Events
 *
 * Every load attempt produces an `import.start` event followed by exactly
 * one of `import.complete` or `import.failed`. A load that fails before the
 * notebook is located (ResolutionError) produces only `import.failed`, with
 * a null path.
 */

export type ImportEvent =
  | {
      readonly kind: 'import.start';
      readonly timestamp: string;
      readonly module: string;
      readonly path: string;
    }
  | {
      readonly kind: 'import.complete';
      readonly timestamp: string;
      readonly module: string;
      readonly path: string;
      /** Number of code cells executed. */
      readonly cells: number;
    }
  | {
      readonly kind: 'import.failed';
      readonly timestamp: string;
      readonly module: string;
      readonly path: string | null;
      readonly error: string;
      readonly message: string;
    };

export type ImportEventKind = ImportEvent['kind'];
