import type { PressTree } from "./types";

export type TestNode = {
  id: string;
  children: TestNode[];
  visible: boolean;
  prePressed: boolean;
  pressed: boolean;
};

type NodeState = Partial<Pick<TestNode, "visible" | "prePressed" | "pressed">>;

export function node(id: string, state: NodeState = {}, children: TestNode[] = []): TestNode {
  return {
    id,
    children,
    visible: state.visible ?? true,
    prePressed: state.prePressed ?? false,
    pressed: state.pressed ?? false,
  };
}

export const testTree: PressTree<TestNode> = {
  children: (n) => n.children,
  isVisible: (n) => n.visible,
  isPrePressed: (n) => n.prePressed,
  isPressed: (n) => n.pressed,
};
