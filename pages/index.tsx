import { ChatPage } from "../features/chat/chat-page";

export default function Home() {
  return <ChatPage />;
}
