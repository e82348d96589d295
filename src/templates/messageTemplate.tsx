type MessageViewProps = {
  title: string;
  message: string;
};

export default function MessageView({ title, message }: MessageViewProps) {
  return (
    <div className="crud-message-view">
      <h2>{title}</h2>
      <p>{message}</p>
    </div>
  );
}
