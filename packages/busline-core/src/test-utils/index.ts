export {
  TaggedHost,
  VOID,
  list,
  vector,
  double,
  rational,
  symbol,
  type TaggedList,
  type TaggedVector,
} from "./tagged_host.ts";

export {
  StubTransport,
  method,
  singleInterface,
  type RecordedCall,
  type StubReply,
} from "./stub_transport.ts";
