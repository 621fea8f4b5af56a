import type { ReceiverContext, SenderContext } from "./context";
import { GoBackNReceiver, GoBackNSender } from "./go-back-n";
import type { BaseReceiver } from "./receiver";
import type { BaseSender } from "./sender";
import {
  SelectiveRepeatReceiver,
  SelectiveRepeatSender,
} from "./selective-repeat";
import { ARQ_STRATEGY } from "./types";

export function createSender(context: SenderContext): BaseSender {
  switch (context.config.strategy) {
    case ARQ_STRATEGY.SELECTIVE_REPEAT:
      return new SelectiveRepeatSender(context);
    case ARQ_STRATEGY.GO_BACK_N:
      return new GoBackNSender(context);
  }
}

export function createReceiver(context: ReceiverContext): BaseReceiver {
  switch (context.config.strategy) {
    case ARQ_STRATEGY.SELECTIVE_REPEAT:
      return new SelectiveRepeatReceiver(context);
    case ARQ_STRATEGY.GO_BACK_N:
      return new GoBackNReceiver(context);
  }
}
