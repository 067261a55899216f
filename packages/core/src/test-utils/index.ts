export {
  createFakeListener,
  createFakeStream,
  type FakeListener,
  type FakeStream,
} from "./network.js";
