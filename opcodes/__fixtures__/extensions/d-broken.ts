function init(): number {
  throw new Error("fixture failed to initialise");
}

export const value = init();
