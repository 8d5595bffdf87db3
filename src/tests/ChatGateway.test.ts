import { InMemoryQueueClient } from "../brokers/InMemoryQueueClient";
import { ChatMessageCodec } from "../core/ChatMessageCodec";
import { Broadcaster } from "../services/Broadcaster";
import { QueuePublisher } from "../services/QueuePublisher";
import { ChatGateway, escapeHtml, parseClientFrame } from "../services/ChatGateway";
import { Loggable } from "../logging";
import { captureLogs, httpRequest, TestClient, waitFor } from "./helpers";

describe("parseClientFrame", () => {
  test("reads the three client commands", () => {
    expect(parseClientFrame('{"command":"SUBSCRIBE","destination":"/topic/messages"}')).toEqual({
      command: "SUBSCRIBE",
      destination: "/topic/messages",
    });
    expect(parseClientFrame('{"command":"UNSUBSCRIBE","destination":"/topic/messages"}')).toEqual({
      command: "UNSUBSCRIBE",
      destination: "/topic/messages",
    });
    expect(
      parseClientFrame(
        '{"command":"SEND","destination":"/app/chat.sendMessage","body":{"content":"hi","sender":"alice"}}'
      )
    ).toEqual({
      command: "SEND",
      destination: "/app/chat.sendMessage",
      body: { content: "hi", sender: "alice" },
    });
  });

  test.each([
    ["{", "Malformed frame: not valid JSON"],
    ["[]", "Malformed frame: expected a JSON object"],
    ['{"command":"SUBSCRIBE"}', "Frame SUBSCRIBE needs a destination"],
    ['{"command":"PUBLISH","destination":"/topic/messages"}', 'Unknown command "PUBLISH"'],
  ])("answers %s with an error text", (data, error) => {
    expect(parseClientFrame(data)).toBe(error);
  });
});

describe("escapeHtml", () => {
  test("escapes markup characters", () => {
    expect(escapeHtml(`<b>"Tom" & 'Jerry'</b>`)).toBe(
      "&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;"
    );
  });
});

describe("ChatGateway", () => {
  let client: InMemoryQueueClient;
  let broadcaster: Broadcaster;
  let publisher: QueuePublisher;
  let gateway: ChatGateway;
  let sockets: TestClient[];
  let baseUrl: string;
  let wsUrl: string;

  beforeAll(async () => {
    await captureLogs();
  });

  beforeEach(async () => {
    client = new InMemoryQueueClient();
    await client.connect();
    broadcaster = new Broadcaster();
    publisher = new QueuePublisher(client, new ChatMessageCodec(), "pong", "ping");
    gateway = new ChatGateway(
      {
        serviceId: "ping",
        serviceName: "Ping <Relay> & Co",
        port: 0,
        wsPath: "/ws",
        heartbeatInterval: 0,
        maxMessagesPerMinute: 20,
      },
      broadcaster,
      publisher
    );
    gateway.setStatusProvider(() => ({ broker: client.getState() }));
    await gateway.start();
    baseUrl = `http://127.0.0.1:${gateway.getPort()}`;
    wsUrl = `ws://127.0.0.1:${gateway.getPort()}/ws`;
    sockets = [];
  });

  afterEach(async () => {
    await Promise.all(sockets.map((socket) => socket.close()));
    await gateway.stop();
    await client.close();
  });

  afterAll(async () => {
    await Loggable.shutdown();
  });

  const connect = async (): Promise<TestClient> => {
    const socket = await TestClient.connect(wsUrl);
    sockets.push(socket);
    return socket;
  };

  test("greets a new connection with its id and the service", async () => {
    const socket = await connect();

    const [connected] = socket.framesWith("CONNECTED");
    expect(connected.service).toBe("ping");
    expect(typeof connected.connectionId).toBe("string");
    expect(gateway.connectionCount()).toBe(1);
  });

  test("a submission is echoed to every subscriber and published", async () => {
    const alice = await connect();
    const watcher = await connect();
    alice.subscribe();
    watcher.subscribe();
    await waitFor(() => broadcaster.subscriberCount() === 2);

    alice.sendChat("alice", "hi");
    await waitFor(() => watcher.framesWith("MESSAGE").length === 1);
    await waitFor(() => alice.framesWith("MESSAGE").length === 1);

    const [frame] = watcher.framesWith("MESSAGE");
    expect(frame.destination).toBe("/topic/messages");
    expect(frame.body).toMatchObject({ content: "hi", sender: "alice", service: "ping" });
    expect(alice.framesWith("MESSAGE")[0]).toEqual(frame);

    await waitFor(() => client.queueDepth("pong") === 1);
    expect(publisher.getPublishedCount()).toBe(1);
  });

  test("an invalid submission gets an ERROR frame and goes nowhere", async () => {
    const alice = await connect();
    alice.subscribe();
    await waitFor(() => broadcaster.subscriberCount() === 1);

    alice.send({ command: "SEND", destination: "/app/chat.sendMessage", body: { content: "", sender: "alice" } });
    await waitFor(() => alice.framesWith("ERROR").length === 1);

    expect(alice.framesWith("ERROR")[0].message).toBe(
      "A message needs a non-empty content and sender"
    );
    expect(alice.framesWith("MESSAGE")).toHaveLength(0);
    expect(client.queueDepth("pong")).toBe(0);
    expect(gateway.getStats().rejected).toBe(1);
  });

  test("a submission whose MESSAGE frame would be too large is refused before echo and publish", async () => {
    const alice = await connect();
    alice.subscribe();
    await waitFor(() => broadcaster.subscriberCount() === 1);

    alice.sendChat("alice", "x".repeat(1024 * 1024 - 120));
    await waitFor(() => alice.framesWith("ERROR").length === 1);

    expect(alice.framesWith("ERROR")[0].message).toBe(
      "Message too large: its frame would exceed 1048576 bytes"
    );
    expect(alice.framesWith("MESSAGE")).toHaveLength(0);
    expect(client.queueDepth("pong")).toBe(0);
    expect(publisher.getPublishedCount()).toBe(0);
    expect(gateway.getStats()).toMatchObject({ accepted: 0, rejected: 1 });
    expect(alice.isOpen()).toBe(true);
  });

  test("malformed frames and unknown destinations are answered with ERROR frames", async () => {
    const alice = await connect();

    alice.send("not json");
    alice.send({ command: "SUBSCRIBE", destination: "/topic/other" });
    alice.send({ command: "SEND", destination: "/app/elsewhere", body: { content: "x", sender: "y" } });
    await waitFor(() => alice.framesWith("ERROR").length === 3);

    expect(alice.framesWith("ERROR").map((frame) => frame.message)).toEqual([
      "Malformed frame: not valid JSON",
      'Unknown destination "/topic/other"',
      'Unknown destination "/app/elsewhere"',
    ]);
    expect(alice.isOpen()).toBe(true);
  });

  test("UNSUBSCRIBE stops deliveries to that client", async () => {
    const alice = await connect();
    alice.subscribe();
    await waitFor(() => broadcaster.subscriberCount() === 1);

    alice.send({ command: "UNSUBSCRIBE", destination: "/topic/messages" });
    await waitFor(() => broadcaster.subscriberCount() === 0);
    alice.sendChat("alice", "hi");
    await waitFor(() => client.queueDepth("pong") === 1);

    expect(alice.framesWith("MESSAGE")).toHaveLength(0);
  });

  test("a closed connection is unsubscribed", async () => {
    const alice = await connect();
    alice.subscribe();
    await waitFor(() => broadcaster.subscriberCount() === 1);

    await alice.close();

    await waitFor(() => gateway.connectionCount() === 0);
    expect(broadcaster.subscriberCount()).toBe(0);
  });

  test("binary frames close the connection", async () => {
    const alice = await connect();

    alice.sendBinary(Buffer.from([1, 2, 3]));

    await waitFor(() => alice.closeCode !== null);
    expect(alice.closeCode).toBe(1008);
  });

  test("going over the message rate closes the connection", async () => {
    const alice = await connect();

    for (let i = 0; i < 21; i++) {
      alice.send({ command: "UNSUBSCRIBE", destination: "/topic/messages" });
    }

    await waitFor(() => alice.closeCode !== null);
    expect(alice.closeCode).toBe(1008);
  });

  test("upgrades on another path are refused", async () => {
    await expect(TestClient.connect(`ws://127.0.0.1:${gateway.getPort()}/other`)).rejects.toThrow();
  });

  test("serves the chat page at / and /<service> with the escaped name", async () => {
    for (const path of ["/", "/ping"]) {
      const response = await httpRequest(`${baseUrl}${path}`);

      expect(response.status).toBe(200);
      expect(response.contentType).toBe("text/html; charset=utf-8");
      expect(response.body).toContain("<title>Ping &lt;Relay&gt; &amp; Co chat</title>");
      expect(response.body).toContain('location.host + "/ws"');
      expect(response.body).not.toContain("{{serviceName}}");
    }
  });

  test("reports status as JSON", async () => {
    const response = await httpRequest(`${baseUrl}/status`);

    expect(response.status).toBe(200);
    expect(response.contentType).toBe("application/json");
    expect(JSON.parse(response.body)).toEqual({
      service: "ping",
      serviceName: "Ping <Relay> & Co",
      broker: "open",
      gateway: { clients: 0, subscribers: 0, accepted: 0, rejected: 0 },
    });
  });

  test("unknown paths are 404 and other methods 405", async () => {
    const missing = await httpRequest(`${baseUrl}/pong`);
    expect(missing.status).toBe(404);
    expect(JSON.parse(missing.body)).toEqual({ error: "Not Found" });

    const post = await httpRequest(`${baseUrl}/`, "POST");
    expect(post.status).toBe(405);
  });
});
