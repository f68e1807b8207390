import type { ChannelId, MessageRef } from "./types.js";

export interface ChannelHandle {
    readonly id: ChannelId;
    send(text: string): Promise<MessageRef>;
}

/** What the core needs from the chat platform. */
export interface ChatGateway {
    resolveChannel(channelId: ChannelId): Promise<ChannelHandle | undefined>;
}
