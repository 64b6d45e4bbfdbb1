export function echoMessage(message: string): void {
  console.log(message);
}

export function echoAll(messages: readonly string[]): void {
  for (const message of messages) {
    echoMessage(message);
  }
}
