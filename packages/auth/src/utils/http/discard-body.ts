/**
 * Cancels an unread response body so the connection is released without draining it.
 * @internal
 */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}
