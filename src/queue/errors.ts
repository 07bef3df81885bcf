/** Raised before any I/O when a topic is empty after trimming. */
export class TopicValidationError extends Error {
  constructor(message = 'topic is empty') {
    super(message);
    this.name = 'TopicValidationError';
  }
}

/**
 * The data file for a topic exists but cannot be read as an envelope or a
 * bare message list. Never raised for a missing or blank file.
 */
export class QueueCorruptError extends Error {
  readonly topic: string;
  readonly path: string;

  constructor(
    topic: string,
    filePath: string,
    detail?: string,
    options?: { cause?: unknown },
  ) {
    const suffix = detail ? ` (${detail})` : '';
    super(
      `corrupt queue file for topic ${JSON.stringify(topic)}: ${filePath}${suffix}`,
      options,
    );
    this.name = 'QueueCorruptError';
    this.topic = topic;
    this.path = filePath;
  }
}
