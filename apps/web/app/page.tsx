import TranscriptUploadForm from "../components/TranscriptUploadForm";

export default function HomePage() {
  return (
    <main className="main-content">
      <h2>Interview Processor</h2>
      <TranscriptUploadForm />
    </main>
  );
}
