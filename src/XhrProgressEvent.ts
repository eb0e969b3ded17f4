import XhrEvent from './XhrEvent.ts';

import type { XhrStateSnapshot } from './XhrEvent.ts';
import type { TXhrProgressEventNames } from './XhrEventNames.ts';

/**
 * XMLHttpRequest ProgressEvent
 */
export default class XhrProgressEvent extends XhrEvent {
  readonly loaded: number;

  readonly total: number;

  readonly lengthComputable: boolean;

  /**
   * @param type event type
   * @param snapshot request state at dispatch time
   * @param loaded loaded bytes
   * @param total total bytes
   */
  constructor(type: TXhrProgressEventNames, snapshot: XhrStateSnapshot, loaded = 0, total = 0) {
    super(type, snapshot);
    this.loaded = loaded;
    this.total = total;
    this.lengthComputable = total > 0;
  }
}
